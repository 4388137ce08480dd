export type { Brand, BrandItem, CreateBrandInput, UpdateBrandFields } from './brand';
export type { Category, CategoryItem, CreateCategoryInput, UpdateCategoryFields } from './category';
export type { ListOptions, Page, Timestamps } from './common';
export type {
  CreateProductInput,
  Product,
  ProductItem,
  ProductListItem,
  UpdateProductFields,
} from './product';
