/**
 * Catalog Table - DynamoDB implementation of the catalog store
 *
 * Translates store operations into document-client commands, normalizes
 * numbers at the boundary and maps failures onto the catalog error taxonomy:
 * a failed condition becomes DuplicateError (put) or NotFoundError
 * (update/delete); anything else becomes DatabaseError.
 */

import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import {
  BatchGetCommand,
  BatchWriteCommand,
  type BatchWriteCommandInput,
  DeleteCommand,
  type DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  type QueryCommandInput,
  ScanCommand,
  type ScanCommandInput,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  type CatalogError,
  DatabaseError,
  DuplicateError,
  isCatalogError,
  NotFoundError,
} from '../errors/catalog-error';
import type { Page } from '../types/common';
import { BATCH_GET_LIMIT, BATCH_WRITE_LIMIT, BATCH_MAX_ATTEMPTS, PK_FIELD } from './constants';
import { decodeContinuationToken, encodeContinuationToken } from './continuation-token';
import type { ItemKey } from './keys';
import { fromStoredItem, toStoredItem, toStoredNumbers } from './numbers';
import type {
  BatchWriteRequest,
  CatalogItem,
  CatalogStore,
  IndexQuery,
  PrefixScan,
  UpdateStatement,
  WriteCondition,
} from './store';

type WriteRequests = NonNullable<BatchWriteCommandInput['RequestItems']>[string];

const DELETED_AT = 'deleted_at';

/**
 * Condition expression for a write condition, referencing the key through `#pk`
 */
function conditionExpression(condition: WriteCondition): string {
  return condition === 'item_exists' ? 'attribute_exists(#pk)' : 'attribute_not_exists(#pk)';
}

function isLive(item: CatalogItem): boolean {
  return item[DELETED_AT] === undefined;
}

function chunk<T>(values: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

export class CatalogTable implements CatalogStore {
  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    readonly tableName: string
  ) {}

  async get(key: ItemKey): Promise<CatalogItem | null> {
    const result = await this.run('get', () =>
      this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { ...key },
        })
      )
    );

    if (!result.Item) {
      return null;
    }
    const item = fromStoredItem(result.Item);
    return isLive(item) ? item : null;
  }

  async put(item: object, condition?: WriteCondition): Promise<void> {
    await this.run(
      'put',
      () =>
        this.docClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: toStoredItem(item),
            ...(condition
              ? {
                  ConditionExpression: conditionExpression(condition),
                  ExpressionAttributeNames: { '#pk': PK_FIELD },
                }
              : {}),
          })
        ),
      () => new DuplicateError('Item already exists or condition not met')
    );
  }

  async update(
    key: ItemKey,
    statement: UpdateStatement,
    condition?: WriteCondition
  ): Promise<CatalogItem> {
    const expressionAttributeNames: Record<string, string> = {};
    const expressionAttributeValues: Record<string, unknown> = {};
    const setExpressions: string[] = [];
    const removeExpressions: string[] = [];

    for (const [field, value] of Object.entries(statement.set)) {
      setExpressions.push(`#${field} = :${field}`);
      expressionAttributeNames[`#${field}`] = field;
      expressionAttributeValues[`:${field}`] = toStoredNumbers(value);
    }
    for (const field of statement.remove) {
      removeExpressions.push(`#${field}`);
      expressionAttributeNames[`#${field}`] = field;
    }

    const clauses = [
      setExpressions.length > 0 ? `SET ${setExpressions.join(', ')}` : '',
      removeExpressions.length > 0 ? `REMOVE ${removeExpressions.join(', ')}` : '',
    ].filter((clause) => clause.length > 0);

    if (condition) {
      expressionAttributeNames['#pk'] = PK_FIELD;
    }

    const result = await this.run(
      'update',
      () =>
        this.docClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { ...key },
            UpdateExpression: clauses.join(' '),
            ExpressionAttributeNames: expressionAttributeNames,
            ...(Object.keys(expressionAttributeValues).length > 0
              ? { ExpressionAttributeValues: expressionAttributeValues }
              : {}),
            ...(condition ? { ConditionExpression: conditionExpression(condition) } : {}),
            ReturnValues: 'ALL_NEW',
          })
        ),
      () => new NotFoundError('Item not found or condition not met')
    );

    if (!result.Attributes) {
      throw new NotFoundError('Item not found');
    }
    return fromStoredItem(result.Attributes);
  }

  async delete(key: ItemKey, condition?: WriteCondition): Promise<CatalogItem | null> {
    const result = await this.run(
      'delete',
      () =>
        this.docClient.send(
          new DeleteCommand({
            TableName: this.tableName,
            Key: { ...key },
            ...(condition
              ? {
                  ConditionExpression: conditionExpression(condition),
                  ExpressionAttributeNames: { '#pk': PK_FIELD },
                }
              : {}),
            ReturnValues: 'ALL_OLD',
          })
        ),
      () => new NotFoundError('Item not found')
    );

    return result.Attributes ? fromStoredItem(result.Attributes) : null;
  }

  async exists(key: ItemKey): Promise<boolean> {
    const result = await this.run('exists', () =>
      this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { ...key },
          ProjectionExpression: '#pk, #deleted_at',
          ExpressionAttributeNames: { '#pk': PK_FIELD, '#deleted_at': DELETED_AT },
        })
      )
    );

    return result.Item !== undefined && isLive(result.Item);
  }

  async queryByIndex(query: IndexQuery): Promise<Page<CatalogItem>> {
    const { index } = query;
    const exclusiveStartKey = decodeContinuationToken(query.continuationToken);

    const params: QueryCommandInput = {
      TableName: this.tableName,
      IndexName: index.indexName,
      KeyConditionExpression:
        index.skPrefix !== undefined ? '#pk = :pk AND begins_with(#sk, :sk)' : '#pk = :pk',
      FilterExpression: 'attribute_not_exists(#deleted_at)',
      ExpressionAttributeNames: {
        '#pk': index.pkField,
        '#deleted_at': DELETED_AT,
        ...(index.skPrefix !== undefined ? { '#sk': index.skField } : {}),
      },
      ExpressionAttributeValues: {
        ':pk': index.pkValue,
        ...(index.skPrefix !== undefined ? { ':sk': index.skPrefix } : {}),
      },
      Limit: query.limit,
      ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
    };

    const result = await this.run('queryByIndex', () => this.docClient.send(new QueryCommand(params)));

    return {
      items: (result.Items ?? []).map(fromStoredItem),
      nextContinuationToken: encodeContinuationToken(result.LastEvaluatedKey),
    };
  }

  async scanByPrefix(scan: PrefixScan): Promise<Page<CatalogItem>> {
    const { index } = scan;
    const exclusiveStartKey = decodeContinuationToken(scan.continuationToken);

    const params: ScanCommandInput = {
      TableName: this.tableName,
      IndexName: index.indexName,
      FilterExpression: 'begins_with(#pk, :prefix) AND attribute_not_exists(#deleted_at)',
      ExpressionAttributeNames: { '#pk': index.pkField, '#deleted_at': DELETED_AT },
      ExpressionAttributeValues: { ':prefix': index.pkValue },
      Limit: scan.limit,
      ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
    };

    const result = await this.run('scanByPrefix', () => this.docClient.send(new ScanCommand(params)));

    return {
      items: (result.Items ?? []).map(fromStoredItem),
      nextContinuationToken: encodeContinuationToken(result.LastEvaluatedKey),
    };
  }

  async batchGet(keys: ItemKey[]): Promise<CatalogItem[]> {
    const items: CatalogItem[] = [];

    for (const batch of chunk(keys, BATCH_GET_LIMIT)) {
      let pending: Record<string, unknown>[] = batch.map((key) => ({ ...key }));

      for (let attempt = 0; pending.length > 0; attempt++) {
        if (attempt >= BATCH_MAX_ATTEMPTS) {
          throw new DatabaseError(
            `Failed to batch get items: ${pending.length} keys left unprocessed`,
            'batchGet'
          );
        }

        const result = await this.run('batchGet', () =>
          this.docClient.send(
            new BatchGetCommand({
              RequestItems: { [this.tableName]: { Keys: pending } },
            })
          )
        );

        for (const item of result.Responses?.[this.tableName] ?? []) {
          const normalized = fromStoredItem(item);
          if (isLive(normalized)) {
            items.push(normalized);
          }
        }
        pending = result.UnprocessedKeys?.[this.tableName]?.Keys ?? [];
      }
    }

    return items;
  }

  async batchWrite(request: BatchWriteRequest): Promise<void> {
    const requests: WriteRequests = [
      ...(request.puts ?? []).map((item) => ({ PutRequest: { Item: toStoredItem(item) } })),
      ...(request.deletes ?? []).map((key) => ({ DeleteRequest: { Key: { ...key } } })),
    ];

    for (const batch of chunk(requests, BATCH_WRITE_LIMIT)) {
      let pending: WriteRequests = batch;

      for (let attempt = 0; pending.length > 0; attempt++) {
        if (attempt >= BATCH_MAX_ATTEMPTS) {
          throw new DatabaseError(
            `Failed to batch write items: ${pending.length} requests left unprocessed`,
            'batchWrite'
          );
        }

        const result = await this.run('batchWrite', () =>
          this.docClient.send(
            new BatchWriteCommand({
              RequestItems: { [this.tableName]: pending },
            })
          )
        );

        pending = result.UnprocessedItems?.[this.tableName] ?? [];
      }
    }
  }

  /**
   * Run one store call, translating its failure
   */
  private async run<T>(
    operation: string,
    call: () => Promise<T>,
    onConditionFailed?: () => CatalogError
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException && onConditionFailed) {
        throw onConditionFailed();
      }
      if (isCatalogError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseError(`Failed to ${operation}: ${message}`, operation, error);
    }
  }
}
