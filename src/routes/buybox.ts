import express from 'express';
import { z } from 'zod';
import { isAsin } from '../lib/asin.js';
import { summarizeResults } from '../lib/batch-orchestrator.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import { resultsToCSV } from '../lib/report.js';
import type { BuyBoxAnalyzer } from '../lib/analyzer.js';

const AnalyzeBody = z.object({
  asins: z.array(z.string().trim().toUpperCase()).min(1).max(500),
  concurrency: z.number().int().min(1).max(10).optional(),
});

export function createBuyBoxRouter(analyzer: Pick<BuyBoxAnalyzer, 'analyze'>): express.Router {
  const router = express.Router();

  // Analyze a list of ASINs; ?format=csv returns the report instead of JSON
  router.post('/buybox/analyze', async (req, res) => {
    const parsed = AnalyzeBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Body must be { asins: string[] } with 1-500 entries' });
      return;
    }

    const invalid = parsed.data.asins.filter((a) => !isAsin(a));
    if (invalid.length) {
      res.status(400).json({ error: 'Invalid ASINs', invalid });
      return;
    }

    // A client that hangs up cancels whatever has not started yet
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const results = await analyzer.analyze(parsed.data.asins, {
        signal: controller.signal,
        concurrency: parsed.data.concurrency,
      });

      if (req.query.format === 'csv') {
        res.type('text/csv').send(resultsToCSV(results));
        return;
      }
      res.json({ results, summary: summarizeResults(results) });
    } catch (e) {
      const status = e instanceof ConfigurationError ? 503 : 500;
      res.status(status).json({ error: errorMessage(e) });
    }
  });

  return router;
}
