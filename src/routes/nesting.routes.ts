import { NextFunction, Request, Response, Router } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { serializeError } from '../errors/nesting.errors';
import { NestingService } from '../services/nesting.service';
import { createLogger } from '../utils/logger';
import {
  optionalString,
  parseConfig,
  parseContainer,
  parsePolygon,
  parseParts,
  parseSheetSizes,
  requireBody,
  requireNumber
} from './nesting.request';

const logger = createLogger('Nesting');

export interface NestingRouterOptions {
  nestingService: NestingService;
  /** Receives job progress events; jobs still run without it. */
  io?: SocketIOServer;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createNestingRouter({ nestingService, io }: NestingRouterOptions): Router {
  const router = Router();

  /**
   * Nest all parts onto one container or sheet
   */
  router.post(
    '/nest',
    asyncRoute(async (req, res) => {
      const body = requireBody(req.body);
      const parts = parseParts(body.parts);
      const container = parseContainer(body, (w, h) => nestingService.createStandardSheet(w, h));
      const report = await nestingService.nest(parts, container, parseConfig(body.config));
      res.json(report);
    })
  );

  /**
   * Spread parts over up to `maxSheets` identical sheets
   */
  router.post(
    '/multi-sheet',
    asyncRoute(async (req, res) => {
      const body = requireBody(req.body);
      const parts = parseParts(body.parts);
      const sheet = parseContainer(body, (w, h) => nestingService.createStandardSheet(w, h));
      const result = await nestingService.nestMultiSheet(parts, sheet, requireNumber(body, 'maxSheets'), parseConfig(body.config));
      res.json(result);
    })
  );

  router.post(
    '/max-quantity',
    asyncRoute(async (req, res) => {
      const body = requireBody(req.body);
      const part = parsePolygon(body.part, 'part');
      const maxAttempts = body.maxAttempts === undefined ? undefined : requireNumber(body, 'maxAttempts');
      const result = await nestingService.nestMaxQuantity(part, requireNumber(body, 'sheetWidth'), requireNumber(body, 'sheetHeight'), {
        maxAttempts,
        units: optionalString(body, 'units'),
        config: parseConfig(body.config)
      });
      res.json(result);
    })
  );

  router.post(
    '/sheet-report',
    asyncRoute(async (req, res) => {
      const body = requireBody(req.body);
      const part = parsePolygon(body.part, 'part');
      const report = await nestingService.createSheetOptimizationReport(part, parseSheetSizes(body.sheetSizes), {
        config: parseConfig(body.config)
      });
      res.json(report);
    })
  );

  /**
   * Start a background nest; progress arrives over Socket.IO
   */
  router.post('/jobs', (req: Request, res: Response) => {
    const body = requireBody(req.body);
    const parts = parseParts(body.parts);
    const container = parseContainer(body, (w, h) => nestingService.createStandardSheet(w, h));
    const config = parseConfig(body.config);
    const socketId = optionalString(body, 'socketId');

    const jobId = uuidv4();
    logger.info(`Starting job ${jobId} (socket: ${socketId ?? 'none'})`);

    const emit = (event: string, payload: object) => {
      if (socketId && io) {
        io.to(socketId).emit(event, { jobId, ...payload });
      }
    };

    nestingService
      .nest(parts, container, config, {
        onGeneration: progress => emit('nesting:progress', progress)
      })
      .then(report => {
        logger.info(`Job ${jobId} completed: ${report.message}`);
        emit('nesting:complete', { result: report });
      })
      .catch((error: unknown) => {
        logger.error(`Job ${jobId} failed:`, error);
        emit('nesting:error', { error: serializeError(error) });
      });

    res.status(202).json({
      jobId,
      message: 'Nesting started. Listen for progress via Socket.IO.'
    });
  });

  return router;
}
