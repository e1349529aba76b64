import { Application, Request, Response } from 'express';
import {
  Architect,
  Logger,
  PERSONA_DESCRIPTION,
  REVIEW_USAGE_PROMPT,
  describeConfig,
  renderCritique,
  severityOf,
} from '@architect-critic/core';
import { formatIssues, reviewBodySchema } from './schema';

/** Registers API endpoints: POST /review plus the read-only info routes. */
export function registerRoutes(app: Application, architect: Architect, logger: Logger): void {
  // POST /review endpoint to critique code or a plan.
  app.post('/review', async (req: Request, res: Response) => {
    // Parse and validate input from request body.
    const parsed = reviewBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    try {
      const { subjectText, context } = parsed.data;
      // Run the review; backend failures come back as a critique.
      const critique = await architect.review(subjectText, context ?? '');
      // Return the critique, its rendering and its severity as JSON.
      res.json({ critique, text: renderCritique(critique), severity: severityOf(critique) });
    } catch (error) {
      // Log the error for debugging.
      logger.error('Error in /review endpoint', { error });
      // Handle errors and return 500 status.
      res.status(500).json({ error: error instanceof Error ? error.message : 'Unexpected error' });
    }
  });

  // GET /config returns the resolved configuration summary.
  app.get('/config', (_req: Request, res: Response) => {
    res.type('text/plain').send(describeConfig(architect.provider.config));
  });

  // GET /persona and GET /prompt return the reviewer's fixed texts.
  app.get('/persona', (_req: Request, res: Response) => {
    res.type('text/plain').send(PERSONA_DESCRIPTION);
  });

  app.get('/prompt', (_req: Request, res: Response) => {
    res.type('text/plain').send(REVIEW_USAGE_PROMPT);
  });

  // GET /health reports the bound backend.
  app.get('/health', (_req: Request, res: Response) => {
    const { providerName, modelId } = architect.provider.config;
    res.json({ status: 'ok', provider: providerName, model: modelId });
  });
}
