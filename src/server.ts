/**
 * HTTP boundary: POST /scrape-blog { "url": string }
 */
import type { Server } from 'node:http';
import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { scrapeBlog, httpStatusFor, type ScrapeOutcome } from './scrape.js';
import { toScrapeResponse } from './extract/types.js';
import { loadExtractionConfig } from './config/extraction-config.js';
import type { ServerConfig } from './config/server-config.js';
import { logger } from './logger.js';

const ScrapeRequestSchema = z.object({
  url: z.string().trim().min(1),
});

export interface AppDeps {
  scrape: (url: string) => Promise<ScrapeOutcome>;
}

function sendError(res: Response, status: number, error: string, message: string): void {
  res.status(status).json({ error, message });
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.post('/scrape-blog', async (req: Request, res: Response) => {
    const body = ScrapeRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      sendError(res, 400, 'input_error', "Missing 'url' field");
      return;
    }

    try {
      const outcome = await deps.scrape(body.data.url);
      if (!outcome.success) {
        sendError(res, httpStatusFor(outcome.error), outcome.error, outcome.message);
        return;
      }
      res.json(toScrapeResponse(outcome.extraction));
    } catch (error) {
      logger.error({ err: error, url: body.data.url }, 'Unhandled error in /scrape-blog');
      sendError(res, 500, 'internal_error', 'Internal error while extracting content');
    }
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      sendError(res, 400, 'input_error', 'Malformed JSON body');
      return;
    }
    logger.error({ err }, 'Unhandled request error');
    sendError(res, 500, 'internal_error', 'Internal server error');
  });

  return app;
}

/** Build the app from runtime config and bind it. */
export function startServer(config: ServerConfig): Promise<Server> {
  const extractionConfig = loadExtractionConfig(config.extractionConfigPath);
  const app = createApp({
    scrape: (url) => scrapeBlog(url, { ...config.fetch, extractionConfig }),
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      logger.info({ host: config.host, port: config.port }, 'Blog scraper listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}
