/**
 * Brand API Handlers
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import {
  type ApiRequest,
  created,
  notFound,
  ok,
  okMessage,
  parseJsonBody,
  parseListOptions,
  resultToResponse,
} from '@catalog/catalog-http';

/**
 * GET /brands
 * List brands ordered by name
 */
export async function handleListBrands({ event, catalog, requestId }: ApiRequest): Promise<APIGatewayProxyResult> {
  const result = await catalog.brands.list(parseListOptions(event));
  return resultToResponse(result, (page) => ok(page), requestId);
}

/**
 * POST /brands
 */
export async function handleCreateBrand({ event, catalog, requestId }: ApiRequest): Promise<APIGatewayProxyResult> {
  const result = await catalog.brands.create(parseJsonBody(event));
  return resultToResponse(result, (brand) => created(brand, 'Brand created successfully'), requestId);
}

/**
 * GET /brands/{id}
 */
export async function handleGetBrand(
  { catalog, requestId }: ApiRequest,
  brandId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.brands.get(brandId);
  return resultToResponse(result, (brand) => (brand ? ok(brand) : notFound('Brand not found')), requestId);
}

/**
 * PUT /brands/{id}
 * Partial update of name, description and website
 */
export async function handleUpdateBrand(
  { event, catalog, requestId }: ApiRequest,
  brandId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.brands.update(brandId, parseJsonBody(event));
  return resultToResponse(result, (brand) => ok(brand, 'Brand updated successfully'), requestId);
}

/**
 * DELETE /brands/{id}
 */
export async function handleDeleteBrand(
  { catalog, requestId }: ApiRequest,
  brandId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.brands.delete(brandId);
  return resultToResponse(
    result,
    (deleted) => (deleted ? okMessage('Brand deleted successfully') : notFound('Brand not found')),
    requestId
  );
}
