import type { CategoryType, OpenStatus } from '../../../constants/product.constants';
import type { IsoDate } from '../../../utils/date';

// Cosmetic Product Model

export interface CosmeticProduct {
  id: number;
  user_id: string; // UUID - chủ sở hữu
  brand_id: number;
  category_id: number | null; // NULL khi category bị xóa
  name: string;
  shade: string;
  capacity: string;
  purchase_date: IsoDate;
  price: number | null;
  purchase_location: string;
  production_date: IsoDate | null;
  expiration_date: IsoDate;
  status: OpenStatus; // default: 'unopened'
  opened_date: IsoDate | null; // chỉ có ý nghĩa khi status = 'opened'
  pao_after_opening: number | null; // months, default: 12
  rating: number | null; // 1-5
  description: string;
  ingredients: string;
  notes: string;
  image_url: string | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Product row joined with its brand and category names
 */
export interface CosmeticProductWithRelations extends CosmeticProduct {
  brand_name: string;
  category_name: string | null;
  category_type: CategoryType | null;
}

export interface CreateCosmeticProductInput {
  brand_id: number;
  category_id?: number | null;
  name: string;
  shade?: string;
  capacity?: string;
  purchase_date?: IsoDate;
  price?: number | null;
  purchase_location?: string;
  production_date?: IsoDate | null;
  expiration_date: IsoDate;
  status?: OpenStatus;
  opened_date?: IsoDate | null;
  pao_after_opening?: number | null;
  rating?: number | null;
  description?: string;
  ingredients?: string;
  notes?: string;
  image_url?: string | null;
}

export type UpdateCosmeticProductInput = Partial<CreateCosmeticProductInput>;
