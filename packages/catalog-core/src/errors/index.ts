export {
  CatalogError,
  type CatalogErrorCode,
  DatabaseError,
  DuplicateError,
  isCatalogError,
  NotFoundError,
  ValidationError,
} from './catalog-error';
export { attempt, err, ok, type Result } from './result';
