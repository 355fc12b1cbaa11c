import express from 'express';
import { createBuyBoxRouter } from './routes/buybox.js';
import type { BuyBoxAnalyzer } from './lib/analyzer.js';

export function createApp(analyzer: Pick<BuyBoxAnalyzer, 'analyze'>): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // health
  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(createBuyBoxRouter(analyzer));

  return app;
}
