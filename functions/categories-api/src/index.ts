/**
 * Categories API Lambda Handler
 *
 * Routes:
 * - GET /categories - List categories
 * - POST /categories - Create a category
 * - GET /categories/{id} - Read a category
 * - PUT /categories/{id} - Update a category
 * - DELETE /categories/{id} - Delete a category
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
  handleCreateCategory,
  handleDeleteCategory,
  handleGetCategory,
  handleListCategories,
  handleUpdateCategory,
} from './handlers/category-handlers';

async function routeCategoryRequest(request: ApiRequest): Promise<APIGatewayProxyResult> {
  const { httpMethod } = request.event;
  const categoryId = pathParameter(request.event, 'id');

  switch (httpMethod) {
    case 'GET':
      return categoryId ? handleGetCategory(request, categoryId) : handleListCategories(request);
    case 'POST':
      return handleCreateCategory(request);
    case 'PUT':
      return categoryId
        ? handleUpdateCategory(request, categoryId)
        : badRequest('Category ID is required');
    case 'DELETE':
      return categoryId
        ? handleDeleteCategory(request, categoryId)
        : badRequest('Category ID is required');
    default:
      return methodNotAllowed(httpMethod);
  }
}

export const handler = createApiHandler('categories-api', routeCategoryRequest);
