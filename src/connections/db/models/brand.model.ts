// Brand Model

export interface Brand {
  id: number;
  name: string; // unique
  description: string;
  created_at: Date;
}

export interface CreateBrandInput {
  name: string;
  description?: string;
}

export interface UpdateBrandInput {
  name?: string;
  description?: string;
}
