import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server as SocketIOServer } from 'socket.io';
import { ConfigError, GeometryError, NestingError } from './errors/nesting.errors';
import { createNestingRouter } from './routes/nesting.routes';
import { NestingService } from './services/nesting.service';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');

export interface AppOptions {
  nestingService?: NestingService;
  io?: SocketIOServer;
  corsOrigins?: string[] | '*';
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const nestingService = options.nestingService ?? new NestingService();

  app.use(cors({ origin: options.corsOrigins ?? '*' }));
  app.use(express.json({ limit: '50mb' }));

  app.use('/api/nesting', createNestingRouter({ nestingService, io: options.io }));

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Nesting API is running' });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof GeometryError || err instanceof ConfigError) {
      logger.warn(`${req.method} ${req.path} rejected: ${err.message}`);
      res.status(400).json({
        error: err.name,
        code: err.code,
        message: err.message,
        ...(err instanceof ConfigError ? { field: err.field } : {})
      });
      return;
    }

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'SyntaxError', code: 'INVALID_JSON', message: err.message });
      return;
    }

    logger.error('Error occurred:', err);
    res.status(500).json({
      error: 'Internal server error',
      code: err instanceof NestingError ? err.code : 'INTERNAL',
      message: err instanceof Error ? err.message : String(err)
    });
  });

  return app;
}
