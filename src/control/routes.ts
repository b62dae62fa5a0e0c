import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '../logger.js';
import type { ControlConfig } from '../config.js';
import type { RecordingOrchestrator } from '../recording/orchestrator.js';
import type { ActionOutcome } from '../types.js';

export interface ControlRouterOptions {
  orchestrator: RecordingOrchestrator;
  /** Read per request so a config reload changes the stop/cancel waits. */
  getControl: () => ControlConfig;
  /** Reported by /health; the port the server actually bound. */
  getPort: () => number;
  /** Current input level (0..1) for /status, when a level meter is attached. */
  getLevel?: () => number;
  /** Re-reads .env and config.json; exposes POST /reload-config when given. */
  reloadConfig?: () => Promise<void>;
}

const NOT_RECORDING_MESSAGE = 'No recording in progress';

function methodNotAllowed(allowed: string) {
  return (_req: Request, res: Response) => {
    res.set('Allow', allowed).status(405).json({ status: 'error', message: 'Method not allowed' });
  };
}

function stopBody(outcome: ActionOutcome | undefined) {
  if (!outcome) {
    // Timed out waiting for the recording to finish.
    return { status: 'stopped', text: '', duration: 0, chars: 0 };
  }
  switch (outcome.status) {
    case 'stopped':
      return { status: 'stopped', text: outcome.text, duration: outcome.duration, chars: outcome.chars };
    case 'not_recording':
      return { status: 'not_recording', text: outcome.text, duration: outcome.duration, message: NOT_RECORDING_MESSAGE };
    default:
      return { status: outcome.status, message: 'Unexpected outcome while stopping' };
  }
}

function cancelBody(outcome: ActionOutcome | undefined) {
  if (!outcome) {
    return { status: 'cancelled', duration: 0, message: 'Recording cancelled' };
  }
  switch (outcome.status) {
    case 'cancelled':
      return { status: 'cancelled', duration: outcome.duration, message: 'Recording cancelled' };
    case 'not_recording':
      return { status: 'not_recording', message: NOT_RECORDING_MESSAGE };
    default:
      return { status: outcome.status, message: 'Unexpected outcome while cancelling' };
  }
}

export function createControlRouter(options: ControlRouterOptions): express.Router {
  const { orchestrator, getControl } = options;
  const router = express.Router();

  const startRecording = (res: Response, extra: Record<string, string> = {}) => {
    orchestrator.dispatch('start');
    res.json({ status: 'started', ...extra, message: 'Recording started' });
  };

  const stopRecording = async (res: Response, extra: Record<string, string> = {}) => {
    const { stopWaitMs } = getControl();
    const outcome = await orchestrator.dispatch('stop').wait(stopWaitMs);
    if (!outcome) {
      logger.warn({ event: 'http_stop_timeout', waitMs: stopWaitMs });
    }
    res.json({ ...stopBody(outcome), ...extra });
  };

  const handleStart = (_req: Request, res: Response) => {
    logger.info({ event: 'http_start' });
    if (orchestrator.isRecording) {
      res.status(409).json({ status: 'already_recording', message: 'Recording is already in progress' });
      return;
    }
    startRecording(res);
  };

  const handleStop = async (_req: Request, res: Response, next: NextFunction) => {
    logger.info({ event: 'http_stop' });
    try {
      if (!orchestrator.isRecording) {
        const snapshot = orchestrator.snapshot();
        res.json({
          status: 'not_recording',
          text: snapshot.lastText,
          duration: snapshot.lastDuration,
          message: NOT_RECORDING_MESSAGE,
        });
        return;
      }
      await stopRecording(res);
    } catch (error) {
      next(error);
    }
  };

  const handleCancel = async (_req: Request, res: Response, next: NextFunction) => {
    logger.info({ event: 'http_cancel' });
    try {
      if (!orchestrator.isRecording) {
        res.json({ status: 'not_recording', message: NOT_RECORDING_MESSAGE });
        return;
      }
      const { cancelWaitMs } = getControl();
      const outcome = await orchestrator.dispatch('cancel').wait(cancelWaitMs);
      if (!outcome) {
        logger.warn({ event: 'http_cancel_timeout', waitMs: cancelWaitMs });
      }
      res.json(cancelBody(outcome));
    } catch (error) {
      next(error);
    }
  };

  const handleToggle = async (_req: Request, res: Response, next: NextFunction) => {
    logger.info({ event: 'http_toggle' });
    try {
      if (!orchestrator.isRecording) {
        startRecording(res, { action: 'start' });
        return;
      }
      await stopRecording(res, { action: 'stop' });
    } catch (error) {
      next(error);
    }
  };

  router.route('/start').get(handleStart).post(handleStart).all(methodNotAllowed('GET, POST'));
  router.route('/stop').get(handleStop).post(handleStop).all(methodNotAllowed('GET, POST'));
  router.route('/cancel').get(handleCancel).post(handleCancel).all(methodNotAllowed('GET, POST'));
  router.route('/toggle').get(handleToggle).post(handleToggle).all(methodNotAllowed('GET, POST'));

  router
    .route('/status')
    .get((_req, res) => {
      const snapshot = orchestrator.snapshot();
      const body: Record<string, unknown> = {
        recording: snapshot.recording,
        state: snapshot.state,
        text: snapshot.text,
      };
      if (snapshot.elapsed !== undefined) {
        body.duration = snapshot.elapsed;
      }
      if (!snapshot.recording) {
        body.last_text = snapshot.lastText;
        body.last_duration = snapshot.lastDuration;
      }
      if (options.getLevel) {
        body.level = options.getLevel();
      }
      res.json(body);
    })
    .all(methodNotAllowed('GET'));

  router
    .route('/health')
    .get((_req, res) => {
      res.json({ status: 'ok', port: options.getPort(), recording: orchestrator.isRecording });
    })
    .all(methodNotAllowed('GET'));

  const { reloadConfig } = options;
  if (reloadConfig) {
    router
      .route('/reload-config')
      .post(async (_req, res, next) => {
        try {
          await reloadConfig();
          logger.info({ event: 'config_reloaded' });
          res.json({ status: 'ok', message: 'Configuration reloaded; applies to the next recording' });
        } catch (error) {
          next(error);
        }
      })
      .all(methodNotAllowed('POST'));
  }

  return router;
}
