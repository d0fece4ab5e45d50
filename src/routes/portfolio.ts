import { Hono } from 'hono';
import { z } from 'zod';
import { createComponentLogger } from '../lib/logger.js';
import { AnalysisError, GenerationError } from '../lib/errors.js';
import { validateBody } from '../lib/validate.js';
import { isDegraded, serializeRecord } from '../agents/record.js';
import type { DataAnalyzer } from '../agents/analyzer.js';
import type { PageGenerator } from '../agents/page-generator.js';

const log = createComponentLogger('routes.portfolio');

const portfolioRequestSchema = z.object({
  cv_text: z.string().trim().min(1, 'cv_text is required').max(100_000),
});

export interface PortfolioRouteDeps {
  analyzer: DataAnalyzer;
  generator: PageGenerator;
}

/**
 * POST /: analyze CV text and generate the page in one request.
 *
 * Runs single-flight: both stages load a model into the same fixed memory
 * budget, so a second request while one is in progress gets 409.
 */
export function createPortfolioRoutes(deps: PortfolioRouteDeps) {
  const portfolio = new Hono();
  let inFlight = false;

  portfolio.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const parsed = validateBody(portfolioRequestSchema, body);
    if (!parsed.ok) {
      return c.json({ error: parsed.error }, 400);
    }

    if (inFlight) {
      return c.json({ error: 'A portfolio is already being generated. Retry when it finishes.' }, 409);
    }

    inFlight = true;
    const requestId = c.get('requestId');
    try {
      const cvText = parsed.data.cv_text;
      const record = await deps.analyzer.analyze(cvText);
      const html = await deps.generator.generate(record, cvText);
      return c.json({ html, record: serializeRecord(record), degraded: isDegraded(record) });
    } catch (err) {
      if (err instanceof AnalysisError || err instanceof GenerationError) {
        log.warn({ requestId, stage: err.stage, error: err.message }, 'Portfolio request failed');
        return c.json({ error: err.message, stage: err.stage, request_id: requestId }, 502);
      }
      throw err;
    } finally {
      inFlight = false;
    }
  });

  return portfolio;
}
