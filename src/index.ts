import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { loadServerConfig } from './config/nesting.config';
import { NestingService } from './services/nesting.service';
import { createNfpExecutor } from './services/nfp-executor.service';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');
const config = loadServerConfig();

// one executor shared by every request; in-process unless NFP_WORKERS > 0
const executor = createNfpExecutor(config.nfpWorkers);
const nestingService = new NestingService(executor);

const io = new SocketIOServer({
  cors: {
    origin: config.corsOrigins,
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000,
  pingInterval: 25000
});

const app = createApp({ nestingService, io, corsOrigins: config.corsOrigins });
const httpServer = createServer(app);
io.attach(httpServer);

io.on('connection', socket => {
  logger.info(`Client connected: ${socket.id}`);
  socket.on('disconnect', () => {
    logger.info(`Client disconnected: ${socket.id}`);
  });
});

httpServer.listen(config.port, () => {
  logger.info(`Server running on port ${config.port} (NFP workers: ${config.nfpWorkers})`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  io.close();
  executor
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Failed to stop NFP workers:', error);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
