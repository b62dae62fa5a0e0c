import { createServer } from 'node:http';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { httpAccessStream, logger } from './logger.js';
import { loadConfig, reloadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { loadEnvironment, reloadEnvironment } from './utils/env.js';
import { errorMessage, HttpError } from './errors.js';
import { createControlRouter } from './control/routes.js';
import type { ControlRouterOptions } from './control/routes.js';
import { RecordingOrchestrator } from './recording/orchestrator.js';
import { createSessionFactory } from './asr/sessionFactory.js';
import { FfmpegAudioSource } from './audio/ffmpegCapture.js';
import { LogPresentationSink } from './presentation/logSink.js';

export function parseAllowedOrigins(raw = process.env.ALLOWED_ORIGINS): string[] {
  const list = raw
    ? raw
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean)
    : [];
  return Array.from(new Set(list));
}

// Hotkey tools and curl send no Origin; browsers must be listed explicitly.
function isOriginAllowed(origin: string | undefined, allowed: string[]): boolean {
  if (!origin) return true;
  return allowed.includes(origin);
}

export interface ControlAppOptions extends ControlRouterOptions {
  allowedOrigins?: string[];
}

export function createControlApp(options: ControlAppOptions): express.Express {
  const app = express();
  const allowedOrigins = options.allowedOrigins ?? parseAllowedOrigins();

  app.use(
    cors({
      origin: (origin, callback) => {
        if (isOriginAllowed(origin ?? undefined, allowedOrigins)) {
          callback(null, true);
          return;
        }
        callback(new HttpError(403, 'origin not allowed'));
      },
    })
  );
  app.use(helmet());
  app.use(morgan('tiny', { stream: httpAccessStream }));
  app.use(createControlRouter(options));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ status: 'error', message: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof HttpError) {
      res.status(error.statusCode).json(error.payload ?? { status: 'error', message: error.message });
      return;
    }
    logger.error({ event: 'http_handler_error', message: errorMessage(error) });
    res.status(500).json({ status: 'error', message: errorMessage(error) });
  });

  return app;
}

export interface Daemon {
  app: express.Express;
  orchestrator: RecordingOrchestrator;
  /** Records the port the HTTP server actually bound, for /health. */
  setBoundPort: (port: number) => void;
}

/**
 * Wires capture, sessions and the control plane around one mutable config.
 * Every consumer reads it through a getter, so `reload` applies to the next
 * recording and the next stop/cancel request.
 */
export function createDaemon(initial: AppConfig, reload: () => Promise<AppConfig>): Daemon {
  let config = initial;
  let boundPort = initial.server.port;

  const presentation = new LogPresentationSink();
  const audioSource = new FfmpegAudioSource({ getAudio: () => config.audio });
  const orchestrator = new RecordingOrchestrator({
    createSession: createSessionFactory(() => config),
    audioSource,
    presentation,
  });

  const app = createControlApp({
    orchestrator,
    getControl: () => config.control,
    getPort: () => boundPort,
    getLevel: () => presentation.level,
    reloadConfig: async () => {
      config = await reload();
    },
  });

  return {
    app,
    orchestrator,
    setBoundPort: (port) => {
      boundPort = port;
    },
  };
}

async function bootstrap() {
  loadEnvironment();
  const config = await loadConfig();
  const { app, orchestrator, setBoundPort } = createDaemon(config, async () => {
    reloadEnvironment();
    reloadConfig();
    return loadConfig();
  });
  const server = createServer(app);

  server.listen(config.server.port, config.server.host, () => {
    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : config.server.port;
    setBoundPort(port);
    logger.info({ event: 'server_started', host: config.server.host, port });
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: 'server_shutdown', signal });
    void orchestrator
      .shutdown()
      .catch((error: unknown) => {
        logger.error({ event: 'shutdown_cancel_failed', message: errorMessage(error) });
      })
      .finally(() => {
        server.close(() => process.exit(0));
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap().catch((error: unknown) => {
    logger.fatal({ event: 'bootstrap_failed', message: errorMessage(error) });
    process.exit(1);
  });
}
