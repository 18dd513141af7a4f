import { Router } from 'express';
import { z } from 'zod';
import { getProperty, listFeaturedProperties, searchProperties } from '../repositories/propertyRepository.js';
import { seedProperties } from '../seed/seedProperties.js';
import type { DocumentStore } from '../store/documentStore.js';
import { storeErrorResponse } from './storeErrors.js';

const TRUE_VALUES = ['true', '1', 'yes', 'on', 't', 'y'] as const;
const FALSE_VALUES = ['false', '0', 'no', 'off', 'f', 'n'] as const;

const booleanParam = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum([...TRUE_VALUES, ...FALSE_VALUES]))
  .transform((v) => TRUE_VALUES.some((t) => t === v));

// An empty value (`?min_price=`) is rejected rather than coerced to 0.
const numberParam = (schema: z.ZodNumber) =>
  z
    .string()
    .refine((v) => v.trim().length > 0, { message: 'Expected a number' })
    .pipe(schema);

const propertyQuerySchema = z.object({
  city: z.string().optional(),
  property_type: z.string().optional(),
  min_price: numberParam(z.coerce.number().min(0)).optional(),
  max_price: numberParam(z.coerce.number().min(0)).optional(),
  bedrooms: numberParam(z.coerce.number().int().min(0)).optional(),
  bathrooms: numberParam(z.coerce.number().min(0)).optional(),
  q: z.string().optional(),
  featured: booleanParam.optional()
});

export function createPropertiesRouter(store: DocumentStore): Router {
  const router = Router();

  router.get('/api/properties', async (req, res) => {
    const parsed = propertyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    const properties = await searchProperties(store, parsed.data);
    return res.json(properties);
  });

  // Registered before /:propertyId so "featured" is not taken for an id.
  router.get('/api/properties/featured', async (_req, res) => {
    const properties = await listFeaturedProperties(store);
    return res.json(properties);
  });

  router.get('/api/properties/:propertyId', async (req, res) => {
    const result = await getProperty(store, req.params.propertyId);
    if (!result.ok) {
      const { status, body } = storeErrorResponse(result.error);
      return res.status(status).json(body);
    }
    return res.json(result.value);
  });

  router.post('/api/setup/seed', async (_req, res) => {
    const result = await seedProperties(store);
    if (!result.ok) {
      const { status, body } = storeErrorResponse(result.error);
      return res.status(status).json(body);
    }
    return res.json({ inserted: result.value });
  });

  return router;
}
