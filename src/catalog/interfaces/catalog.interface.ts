export interface ServiceInput {
  name?: string;
  description?: string | null;
  category?: string;
  basePrice?: number;
  priceRange?: string | null;
  isActive?: boolean;
  imageUrl?: string | null;
  processingTime?: string;
}

export type NewService = ServiceInput & { name: string };

export interface ProductInput {
  name?: string;
  description?: string | null;
  price?: number;
  unit?: string;
  minQuantity?: number;
  isActive?: boolean;
  specifications?: Record<string, string> | null;
}

export type NewProduct = ProductInput & { name: string };

export interface SettingEntry {
  key: string;
  value: string;
  description?: string | null;
}

export interface CatalogStats {
  totalServices: number;
  activeServices: number;
  categories: number;
}
