import { z } from 'zod';

export const propertySchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  price: z.number().min(0),
  address: z.string(),
  city: z.string(),
  state: z.string(),
  zip_code: z.string(),
  bedrooms: z.number().int().min(0),
  bathrooms: z.number().min(0),
  area_sqft: z.number().min(0),
  property_type: z.string(),
  images: z.array(z.string()).default([]),
  amenities: z.array(z.string()).default([]),
  featured: z.boolean().default(false),
  status: z.string().default('For Sale'),
  listed_at: z.coerce.date().optional()
});

export type PropertyInput = z.infer<typeof propertySchema>;

// Validates without rewriting: inquiries are stored exactly as submitted.
const nonBlank = (max: number) =>
  z
    .string()
    .max(max)
    .refine((s) => s.trim().length > 0, { message: 'Must not be blank' });

export const inquirySchema = z.object({
  name: nonBlank(200),
  email: z.string().email(),
  phone: z.string().max(50).optional(),
  message: nonBlank(5000),
  property_id: z.string().optional()
});
