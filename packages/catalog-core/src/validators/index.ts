export {
  BRAND_DESCRIPTION_RULE,
  BRAND_NAME_RULE,
  validateBrandUpdate,
  validateCreateBrand,
  validateWebsite,
} from './brand-validators';
export {
  CATEGORY_DESCRIPTION_RULE,
  CATEGORY_NAME_RULE,
  validateCategoryUpdate,
  validateCreateCategory,
} from './category-validators';
export {
  isBlank,
  isRecord,
  isValidUuid,
  rejectUnknownFields,
  requireRecord,
  requireText,
  requireUuid,
  type TextRule,
} from './common';
export {
  MAX_IMAGES,
  MAX_PRICE,
  MAX_STOCK_QUANTITY,
  PRODUCT_DESCRIPTION_RULE,
  PRODUCT_NAME_RULE,
  validateBrandId,
  validateCategoryId,
  validateCreateProduct,
  validateImages,
  validatePrice,
  validateProductUpdate,
  validateStockQuantity,
} from './product-validators';
