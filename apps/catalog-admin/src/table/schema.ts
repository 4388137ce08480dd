/**
 * Catalog table definition
 *
 * Primary key PK/SK plus the three secondary indexes the repositories query.
 * All attributes projected, on-demand billing.
 */

import type {
  AttributeDefinition,
  CreateTableCommandInput,
  GlobalSecondaryIndex,
  KeySchemaElement,
  TableDescription,
} from '@aws-sdk/client-dynamodb';
import { GSI, PK_FIELD, SK_FIELD } from '@catalog/catalog-core';

const KEY_SCHEMA: KeySchemaElement[] = [
  { AttributeName: PK_FIELD, KeyType: 'HASH' },
  { AttributeName: SK_FIELD, KeyType: 'RANGE' },
];

const ATTRIBUTE_DEFINITIONS: AttributeDefinition[] = [
  { AttributeName: PK_FIELD, AttributeType: 'S' },
  { AttributeName: SK_FIELD, AttributeType: 'S' },
  { AttributeName: GSI.BRAND_PRODUCTS.pk, AttributeType: 'S' },
  { AttributeName: GSI.BRAND_PRODUCTS.sk, AttributeType: 'S' },
  { AttributeName: GSI.FLEXIBLE.pk, AttributeType: 'S' },
  { AttributeName: GSI.FLEXIBLE.sk, AttributeType: 'S' },
];

const INDEXES = [GSI.INVERTED, GSI.BRAND_PRODUCTS, GSI.FLEXIBLE];

const GLOBAL_SECONDARY_INDEXES: GlobalSecondaryIndex[] = INDEXES.map((index) => ({
  IndexName: index.name,
  KeySchema: [
    { AttributeName: index.pk, KeyType: 'HASH' },
    { AttributeName: index.sk, KeyType: 'RANGE' },
  ],
  Projection: { ProjectionType: 'ALL' },
}));

export function createTableInput(tableName: string): CreateTableCommandInput {
  return {
    TableName: tableName,
    KeySchema: KEY_SCHEMA,
    AttributeDefinitions: ATTRIBUTE_DEFINITIONS,
    GlobalSecondaryIndexes: GLOBAL_SECONDARY_INDEXES,
    BillingMode: 'PAY_PER_REQUEST',
  };
}

function keyOf(schema: KeySchemaElement[] | undefined, keyType: 'HASH' | 'RANGE'): string | undefined {
  return schema?.find((element) => element.KeyType === keyType)?.AttributeName;
}

/**
 * Differences between a described table and the catalog's definition; empty when it matches
 */
export function checkTable(table: TableDescription): string[] {
  const problems: string[] = [];

  if (keyOf(table.KeySchema, 'HASH') !== PK_FIELD || keyOf(table.KeySchema, 'RANGE') !== SK_FIELD) {
    problems.push(`Primary key must be ${PK_FIELD}/${SK_FIELD}`);
  }

  for (const expected of INDEXES) {
    const actual = table.GlobalSecondaryIndexes?.find((index) => index.IndexName === expected.name);
    if (!actual) {
      problems.push(`Missing index ${expected.name}`);
      continue;
    }
    const pk = keyOf(actual.KeySchema, 'HASH');
    const sk = keyOf(actual.KeySchema, 'RANGE');
    if (pk !== expected.pk || sk !== expected.sk) {
      problems.push(
        `Index ${expected.name} is keyed ${pk ?? '?'}/${sk ?? '?'}, expected ${expected.pk}/${expected.sk}`
      );
    }
    if (actual.Projection?.ProjectionType !== 'ALL') {
      problems.push(`Index ${expected.name} must project all attributes`);
    }
  }

  return problems;
}
