import { Router } from 'express';
import { inquirySchema } from '../schemas.js';
import { createInquiry } from '../repositories/inquiryRepository.js';
import type { DocumentStore } from '../store/documentStore.js';

export function createInquiriesRouter(store: DocumentStore): Router {
  const router = Router();

  router.post('/api/inquiries', async (req, res) => {
    const parsed = inquirySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    const result = await createInquiry(store, parsed.data);
    if (!result.ok) {
      return res
        .status(503)
        .json({ error: 'INQUIRY_NOT_SAVED', message: `Could not save inquiry: ${result.error.message}` });
    }
    return res.json({ success: true });
  });

  return router;
}
