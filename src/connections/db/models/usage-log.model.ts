// Usage Log Model - sắp xếp mới nhất trước

export interface UsageLog {
  id: number;
  product_id: number;
  used_at: Date;
  notes: string;
}

export interface CreateUsageLogInput {
  notes?: string;
}
