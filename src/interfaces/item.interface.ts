export interface Item {
  id: string;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateItemDto {
  name: string;
  description?: string | null;
}

export interface UpdateItemDto {
  name?: string;
  description?: string | null;
}

export interface ItemPage {
  items: Item[];
  total: number;
}
