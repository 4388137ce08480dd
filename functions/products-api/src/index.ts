/**
 * Products API Lambda Handler
 *
 * Routes:
 * - GET /products - List products
 * - POST /products - Create a product
 * - GET /products/{id} - Read a product
 * - PUT /products/{id} - Update a product
 * - DELETE /products/{id} - Delete a product
 * - GET /products/by-brand/{brand_id} - List products of a brand
 * - GET /products/by-category/{category_id} - List products of a category
 * - PATCH /products/{id}/stock - Set or adjust stock
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import {
  type ApiRequest,
  badRequest,
  createApiHandler,
  methodNotAllowed,
  notFound,
  pathParameter,
} from '@catalog/catalog-http';
import {
  handleCreateProduct,
  handleDeleteProduct,
  handleGetProduct,
  handleListProducts,
  handleListProductsByBrand,
  handleListProductsByCategory,
  handleUpdateProduct,
  handleUpdateStock,
} from './handlers/product-handlers';

type ResourceRoute = (request: ApiRequest) => Promise<APIGatewayProxyResult>;

/**
 * Handlers per API Gateway resource, then per method
 */
const routes: Record<string, Record<string, ResourceRoute>> = {
  '/products': {
    GET: handleListProducts,
    POST: handleCreateProduct,
  },
  '/products/{id}': {
    GET: withPathId('id', 'Product ID is required', handleGetProduct),
    PUT: withPathId('id', 'Product ID is required', handleUpdateProduct),
    DELETE: withPathId('id', 'Product ID is required', handleDeleteProduct),
  },
  '/products/by-brand/{brand_id}': {
    GET: withPathId('brand_id', 'Brand ID is required', handleListProductsByBrand),
  },
  '/products/by-category/{category_id}': {
    GET: withPathId('category_id', 'Category ID is required', handleListProductsByCategory),
  },
  '/products/{id}/stock': {
    PATCH: withPathId('id', 'Product ID is required', handleUpdateStock),
  },
};

function withPathId(
  name: string,
  missingMessage: string,
  handle: (request: ApiRequest, id: string) => Promise<APIGatewayProxyResult>
): ResourceRoute {
  return async (request) => {
    const id = pathParameter(request.event, name);
    return id ? handle(request, id) : badRequest(missingMessage);
  };
}

async function routeProductRequest(request: ApiRequest): Promise<APIGatewayProxyResult> {
  const { httpMethod, resource } = request.event;
  const methods = routes[resource];

  if (!methods) {
    return notFound(`Unknown route: ${httpMethod} ${resource}`);
  }
  const route = methods[httpMethod];
  if (!route) {
    return methodNotAllowed(httpMethod);
  }
  return route(request);
}

export const handler = createApiHandler('products-api', routeProductRequest);
