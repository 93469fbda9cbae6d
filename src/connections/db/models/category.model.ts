import type { CategoryType } from '../../../constants/product.constants';

// Category Model - unique theo (name, category_type)

export interface Category {
  id: number;
  name: string;
  category_type: CategoryType;
  created_at: Date;
}

export interface CreateCategoryInput {
  name: string;
  category_type: CategoryType;
}

export interface UpdateCategoryInput {
  name?: string;
  category_type?: CategoryType;
}
