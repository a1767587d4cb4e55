import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { createAssistantController } from './controllers/assistantController';
import { errorHandler } from './middlewares/errorHandler';
import { createAssistantRouter } from './routes/assistantRoutes';
import type { DocsAssistant } from './services/rag/docsAssistant';
import type { DocumentSource } from './services/rag/types';

export interface AppOptions {
  source?: DocumentSource;
  /** morgan format; `false` disables access logs. */
  accessLog?: string | false;
}

export function createApp(assistant: DocsAssistant, options: AppOptions = {}): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  if (options.accessLog !== false) {
    app.use(morgan(options.accessLog ?? 'dev'));
  }
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ ok: true, index: assistant.status() });
  });

  app.use('/api/assistant', createAssistantRouter(createAssistantController(assistant, options.source)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Route not found' });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    errorHandler(err, req, res, next);
  });

  return app;
}
