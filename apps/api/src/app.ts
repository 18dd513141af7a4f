import express from 'express';
import cors from 'cors';
import { createInquiriesRouter } from './routes/inquiries.js';
import { createPropertiesRouter } from './routes/properties.js';
import { getEnv } from './env.js';
import type { DocumentStore } from './store/documentStore.js';

export function createApp(store: DocumentStore) {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // If not configured, allow all origins.
        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/', (_req, res) => res.json({ message: 'Real Estate API is running' }));
  app.get('/api/hello', (_req, res) => res.json({ message: 'Welcome to your real estate backend!' }));

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.get('/health/store', async (_req, res) => {
    const result = await store.ping();
    if (!result.ok) {
      return res.status(503).json({ ok: false, error: 'STORE_UNAVAILABLE', message: result.error.message });
    }
    return res.json({ ok: true });
  });

  app.use(createPropertiesRouter(store));
  app.use(createInquiriesRouter(store));

  return app;
}
