export { BrandService } from './brand-service';
export { CategoryService } from './category-service';
export { clampLimit, listOptions, runOperation } from './operation';
export { ProductService } from './product-service';
