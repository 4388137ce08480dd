/**
 * Product API Handlers
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import { isRecord } from '@catalog/catalog-core';
import {
  type ApiRequest,
  badRequest,
  created,
  notFound,
  ok,
  okMessage,
  parseJsonBody,
  parseListOptions,
  resultToResponse,
} from '@catalog/catalog-http';

/**
 * GET /products
 * List products ordered by name
 */
export async function handleListProducts({
  event,
  catalog,
  requestId,
}: ApiRequest): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.list(parseListOptions(event));
  return resultToResponse(result, (page) => ok(page), requestId);
}

/**
 * POST /products
 * Brand and category must exist; stock_quantity defaults to 0
 */
export async function handleCreateProduct({
  event,
  catalog,
  requestId,
}: ApiRequest): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.create(parseJsonBody(event));
  return resultToResponse(
    result,
    (product) => created(product, 'Product created successfully'),
    requestId
  );
}

/**
 * GET /products/{id}
 */
export async function handleGetProduct(
  { catalog, requestId }: ApiRequest,
  productId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.get(productId);
  return resultToResponse(
    result,
    (product) => (product ? ok(product) : notFound('Product not found')),
    requestId
  );
}

/**
 * PUT /products/{id}
 */
export async function handleUpdateProduct(
  { event, catalog, requestId }: ApiRequest,
  productId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.update(productId, parseJsonBody(event));
  return resultToResponse(result, (product) => ok(product, 'Product updated successfully'), requestId);
}

/**
 * DELETE /products/{id}
 * Removes the product and its list entry
 */
export async function handleDeleteProduct(
  { catalog, requestId }: ApiRequest,
  productId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.delete(productId);
  return resultToResponse(
    result,
    (deleted) => (deleted ? okMessage('Product deleted successfully') : notFound('Product not found')),
    requestId
  );
}

/**
 * GET /products/by-brand/{brand_id}
 */
export async function handleListProductsByBrand(
  { event, catalog, requestId }: ApiRequest,
  brandId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.listByBrand(brandId, parseListOptions(event));
  return resultToResponse(result, (page) => ok(page), requestId);
}

/**
 * GET /products/by-category/{category_id}
 */
export async function handleListProductsByCategory(
  { event, catalog, requestId }: ApiRequest,
  categoryId: string
): Promise<APIGatewayProxyResult> {
  const result = await catalog.products.listByCategory(categoryId, parseListOptions(event));
  return resultToResponse(result, (page) => ok(page), requestId);
}

/**
 * PATCH /products/{id}/stock
 * `{ stock_quantity }` sets the stock, `{ quantity_change }` adjusts it.
 * stock_quantity wins when both are present.
 */
export async function handleUpdateStock(
  { event, catalog, requestId }: ApiRequest,
  productId: string
): Promise<APIGatewayProxyResult> {
  const body = parseJsonBody(event);
  if (!isRecord(body)) {
    return badRequest('Request body must be a JSON object');
  }

  if ('stock_quantity' in body) {
    const quantity = body.stock_quantity;
    if (typeof quantity !== 'number' || !Number.isInteger(quantity)) {
      return badRequest('stock_quantity must be an integer');
    }
    const result = await catalog.products.updateStock(productId, quantity);
    return resultToResponse(result, (product) => ok(product, 'Stock updated successfully'), requestId);
  }

  if ('quantity_change' in body) {
    const change = body.quantity_change;
    if (typeof change !== 'number' || !Number.isInteger(change)) {
      return badRequest('quantity_change must be an integer');
    }
    const result = await catalog.products.adjustStock(productId, change);
    return resultToResponse(result, (product) => ok(product, 'Stock adjusted successfully'), requestId);
  }

  return badRequest('Either stock_quantity or quantity_change is required');
}
