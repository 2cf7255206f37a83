/**
 * HTTP API for translation sessions
 */

import express, { type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { validateConfig, hasAIProvider } from './config.js';
import type { TranslationService, SessionSourceInput } from './services/translation-service.js';
import type { SessionRecord } from './storage/database.js';
import { PipelineError, errorMessage } from './engine/errors.js';

const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

// Multipart fields arrive as strings
const numberField = z.coerce.number().int().positive();
const booleanField = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

export const startSessionSchema = z.object({
  targetLanguage: z.string().trim().min(1, 'targetLanguage is required'),
  sourcePath: z.string().trim().min(1).optional(),
  maxChunkSize: numberField.optional(),
  maxChunkCount: numberField.optional(),
  metadataPreviewSize: numberField.optional(),
  temperature: z.coerce.number().min(0).max(2).optional(),
  validationEnabled: booleanField.optional(),
  concurrency: numberField.optional(),
  entities: z.string().optional(),
  style: z.string().optional(),
});

export type StartSessionBody = z.infer<typeof startSessionSchema>;

/**
 * HTTP status for an error raised while handling a request
 */
export function statusForError(error: unknown): number {
  if (error instanceof z.ZodError) return 400;
  if (error instanceof PipelineError) {
    switch (error.kind) {
      case 'DecodeError':
      case 'ChunkingError':
        return 400;
      case 'ConfigurationError':
        return 409;
      default:
        return 500;
    }
  }
  return 500;
}

function sendError(res: Response, error: unknown, fallback: string): void {
  const status = statusForError(error);
  if (status >= 500) {
    console.error(`[API] ${fallback}: ${errorMessage(error)}`);
  }
  if (error instanceof z.ZodError) {
    res.status(status).json({ error: 'Invalid request', issues: error.issues });
    return;
  }
  res.status(status).json({ error: status >= 500 ? fallback : errorMessage(error) });
}

function summarize(record: SessionRecord) {
  return {
    id: record.id,
    filename: record.filename,
    targetLanguage: record.session.targetLanguage,
    stage: record.state.stage,
    counters: record.state.counters,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

export interface AppDependencies {
  config: AppConfig;
  service: TranslationService;
}

export function createApp({ config, service }: AppDependencies): express.Express {
  const configValidation = validateConfig(config);
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES },
  });

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // ============ API Routes ============

  // System status
  app.get('/api/status', (_req, res) => {
    res.json({
      version: '0.1.0',
      ready: configValidation.valid,
      ai: {
        provider: config.openai.apiKey ? 'OpenAI' : null,
        model: config.openai.model,
        configured: hasAIProvider(config),
      },
      config: {
        valid: configValidation.valid,
        errors: configValidation.errors,
      },
      storage: service.storeName,
    });
  });

  // ============ Sessions ============

  // Start a session from an uploaded file or a path under SOURCE_DIR
  app.post('/api/sessions', upload.single('file'), async (req: Request, res: Response) => {
    try {
      const body = startSessionSchema.parse(req.body ?? {});

      let source: SessionSourceInput;
      if (req.file) {
        source = { kind: 'upload', bytes: req.file.buffer, filename: req.file.originalname };
      } else if (body.sourcePath) {
        source = { kind: 'path', path: body.sourcePath };
      } else {
        res.status(400).json({ error: 'Either a file upload or sourcePath is required' });
        return;
      }

      const record = await service.start({
        targetLanguage: body.targetLanguage,
        source,
        entities: body.entities,
        style: body.style,
        overrides: {
          maxChunkSize: body.maxChunkSize,
          maxChunkCount: body.maxChunkCount,
          metadataPreviewSize: body.metadataPreviewSize,
          temperature: body.temperature,
          validationEnabled: body.validationEnabled,
          concurrency: body.concurrency,
        },
      });

      res.status(202).json({ status: 'started', sessionId: record.id });
    } catch (error) {
      sendError(res, error, 'Failed to start session');
    }
  });

  app.get('/api/sessions', async (_req, res) => {
    try {
      const sessions = await service.list();
      res.json(sessions.map(summarize));
    } catch (error) {
      sendError(res, error, 'Failed to list sessions');
    }
  });

  app.get('/api/sessions/:id', async (req, res) => {
    try {
      const record = await service.get(req.params.id);
      if (!record) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }
      res.json({ ...record, running: service.isRunning(record.id) });
    } catch (error) {
      sendError(res, error, 'Failed to get session');
    }
  });

  app.get('/api/sessions/:id/artifacts', async (req, res) => {
    try {
      const artifacts = await service.artifacts(req.params.id);
      if (!artifacts) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }
      res.json(artifacts);
    } catch (error) {
      sendError(res, error, 'Failed to list artifacts');
    }
  });

  app.post('/api/sessions/:id/cancel', (req, res) => {
    const cancelled = service.cancel(req.params.id);
    if (!cancelled) {
      res.status(404).json({ error: 'Session is not running' });
      return;
    }
    res.json({ status: 'cancelling', sessionId: req.params.id });
  });

  app.post('/api/sessions/:id/resume', async (req, res) => {
    try {
      const record = await service.resume(req.params.id);
      if (!record) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }
      res.status(202).json({ status: 'resumed', sessionId: record.id });
    } catch (error) {
      sendError(res, error, 'Failed to resume session');
    }
  });

  return app;
}
