/**
 * Category API Handlers
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
 * GET /categories
 * List categories ordered by name
 */
export async function handleListCategories({
  event,
  catalog,
  requestId,
}: ApiRequest): Promise<APIGatewayProxyResult> {
  const result = await catalog.categories.list(parseListOptions(event));
  return resultToResponse(result, (page) => ok(page), requestId);
}

/**
 * POST /categories
 */
export async function handleCreateCategory({
  event,
  catalog,
  requestId,
}: ApiRequest): Promise<APIGatewayProxyResult> {
  const result = await catalog.categories.create(parseJsonBody(event));
  return resultToResponse(
    result,
    (category) => created(category, 'Category created successfully'),
    requestId
  );
}

/**
 * GET /categories/{id}
 */
export async function handleGetCategory(
  { catalog, requestId }: ApiRequest,
  categoryId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.categories.get(categoryId);
  return resultToResponse(
    result,
    (category) => (category ? ok(category) : notFound('Category not found')),
    requestId
  );
}

/**
 * PUT /categories/{id}
 * Partial update of name and description
 */
export async function handleUpdateCategory(
  { event, catalog, requestId }: ApiRequest,
  categoryId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.categories.update(categoryId, parseJsonBody(event));
  return resultToResponse(result, (category) => ok(category, 'Category updated successfully'), requestId);
}

/**
 * DELETE /categories/{id}
 */
export async function handleDeleteCategory(
  { catalog, requestId }: ApiRequest,
  categoryId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.categories.delete(categoryId);
  return resultToResponse(
    result,
    (deleted) => (deleted ? okMessage('Category deleted successfully') : notFound('Category not found')),
    requestId
  );
}
