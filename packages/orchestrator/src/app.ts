import express, { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { HumanResponseSchema } from './contracts/index.js';
import { NotFoundError, OrchestratorError, ValidationError, formatZodIssues } from './errors/index.js';
import { moduleLogger } from './logging/logger.js';
import type { Orchestrator, RunResult } from './agent/orchestrator.js';

const log = moduleLogger('http');

export interface AppOptions {
  sha?: string;
}

function correlationIdOf(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : 'unknown';
}

function summarize(result: RunResult) {
  return {
    kind: result.kind,
    conversation_id: result.conversation_id,
    status: result.status,
    epoch: result.state.epoch,
    interrupt: result.kind === 'interrupted' ? result.interrupt : null,
    draft_output: result.state.draft_output,
  };
}

function respondWithError(res: Response, error: unknown): Response {
  const cid = correlationIdOf(res);

  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: error.message, correlation_id: cid });
  }
  if (error instanceof OrchestratorError && error.kind === 'validation') {
    return res.status(400).json({ error: error.message, details: error.details, correlation_id: cid });
  }

  log.error({ msg: error instanceof Error ? error.message : String(error), err: error, correlation_id: cid });
  return res.status(500).json({ error: 'internal_error', correlation_id: cid });
}

export function createApp(engine: Orchestrator, options: AppOptions = {}) {
  const sha = options.sha ?? 'unknown';
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = req.header('x-correlation-id');
    const cid = incoming && incoming.length > 0 ? incoming : uuidv4();
    res.locals.correlationId = cid;
    res.setHeader('x-correlation-id', cid);
    next();
  });

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      log.info({
        msg: 'http_request',
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration_ms: Date.now() - start,
        correlation_id: correlationIdOf(res),
      });
    });
    next();
  });

  // Health endpoint
  app.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ service: 'orchestrator', sha, status: 'ok' });
  });

  // Intake: run a new message until the first interrupt or the end
  app.post('/conversations', async (req: Request, res: Response) => {
    try {
      const result = await engine.start(req.body);
      return res.status(201).json(summarize(result));
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  app.get('/conversations/:id', async (req: Request, res: Response) => {
    try {
      const state = await engine.get(req.params.id);
      return res.status(200).json(state);
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  app.get('/interrupts', async (_req: Request, res: Response) => {
    try {
      const pending = await engine.listPending();
      return res.status(200).json({ count: pending.length, interrupts: pending });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  app.post('/conversations/:id/resume', async (req: Request, res: Response) => {
    try {
      const parsed = HumanResponseSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid human response', formatZodIssues(parsed.error));
      }
      const result = await engine.resume(req.params.id, parsed.data);
      return res.status(200).json(summarize(result));
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  app.post('/interrupts/expire', async (_req: Request, res: Response) => {
    try {
      const results = await engine.expireOverdue();
      return res.status(200).json({ expired: results.length, results: results.map(summarize) });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  // Central error handler
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid_json', correlation_id: correlationIdOf(res) });
      return;
    }
    respondWithError(res, err);
  });

  return app;
}
