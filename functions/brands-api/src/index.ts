/**
 * Brands API Lambda Handler
 *
 * Routes:
 * - GET /brands - List brands
 * - POST /brands - Create a brand
 * - GET /brands/{id} - Read a brand
 * - PUT /brands/{id} - Update a brand
 * - DELETE /brands/{id} - Delete a brand
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import {
  type ApiRequest,
  badRequest,
  createApiHandler,
  methodNotAllowed,
  pathParameter,
} from '@catalog/catalog-http';
import {
  handleCreateBrand,
  handleDeleteBrand,
  handleGetBrand,
  handleListBrands,
  handleUpdateBrand,
} from './handlers/brand-handlers';

async function routeBrandRequest(request: ApiRequest): Promise<APIGatewayProxyResult> {
  const { httpMethod } = request.event;
  const brandId = pathParameter(request.event, 'id');

  switch (httpMethod) {
    case 'GET':
      return brandId ? handleGetBrand(request, brandId) : handleListBrands(request);
    case 'POST':
      return handleCreateBrand(request);
    case 'PUT':
      return brandId ? handleUpdateBrand(request, brandId) : badRequest('Brand ID is required');
    case 'DELETE':
      return brandId ? handleDeleteBrand(request, brandId) : badRequest('Brand ID is required');
    default:
      return methodNotAllowed(httpMethod);
  }
}

export const handler = createApiHandler('brands-api', routeBrandRequest);
