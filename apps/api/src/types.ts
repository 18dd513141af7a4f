export const COLLECTIONS = {
  property: 'property',
  inquiry: 'inquiry'
} as const;

export interface Property {
  title: string;
  description: string;
  price: number;
  address: string;
  city: string;
  state: string;
  zip_code: string;
  bedrooms: number;
  bathrooms: number;
  area_sqft: number;
  property_type: string; // House, Apartment, Condo, ...
  images: string[];
  amenities: string[];
  featured: boolean;
  status: string;
  listed_at: Date;
}

export interface Inquiry {
  name: string;
  email: string;
  phone?: string;
  message: string;
  property_id?: string;
}

/** Search criteria; an absent field places no constraint on that dimension. */
export interface PropertyFilterCriteria {
  city?: string;
  property_type?: string;
  min_price?: number;
  max_price?: number;
  bedrooms?: number;
  bathrooms?: number;
  q?: string;
  featured?: boolean;
}

/** A document as read from the store. The store identity lives under `_id`. */
export type RawDocument = Record<string, unknown>;

/** A document as returned to API clients: `id` instead of `_id`, ISO timestamps. */
export type ExternalDocument = Record<string, unknown>;
