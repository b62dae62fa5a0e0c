import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { OneShot } from '../utils/oneShot.js';
import { SerialExecutor } from './serialExecutor.js';
import { stripTrailingPunctuation } from './punctuation.js';
import type {
  ActionOutcome,
  AudioSource,
  PresentationSink,
  RecognitionSession,
  RecordingAction,
  RecordingSnapshot,
  RecordingState,
  SessionEndInfo,
  SessionFactory,
} from '../types.js';

export interface RecordingOrchestratorOptions {
  createSession: SessionFactory;
  audioSource: AudioSource;
  presentation?: PresentationSink;
  /** Graceful-finish bound passed to the session; the session's own default applies when unset. */
  finishTimeoutMs?: number;
  /** Forced-stop bound passed to the session; the session's own default applies when unset. */
  cancelTimeoutMs?: number;
  now?: () => number;
}

export function roundDuration(seconds: number): number {
  return Math.round(seconds * 100) / 100;
}

/**
 * Owns the recording state. Every action runs on one serial executor, so a
 * start, stop, cancel or toggle always sees the state left by the previous
 * one; callers get a one-shot signal that resolves with the outcome.
 */
export class RecordingOrchestrator {
  private state: RecordingState = 'idle';
  private session: RecognitionSession | null = null;
  private startedAt: number | null = null;
  private transcript = '';
  private lastText = '';
  private lastDuration = 0;
  private readonly executor = new SerialExecutor();
  private readonly now: () => number;

  constructor(private readonly options: RecordingOrchestratorOptions) {
    this.now = options.now ?? Date.now;
  }

  get recordingState(): RecordingState {
    return this.state;
  }

  get isRecording(): boolean {
    return this.state === 'active';
  }

  dispatch(action: RecordingAction): OneShot<ActionOutcome> {
    const signal = new OneShot<ActionOutcome>();
    void this.executor.run(() => this.execute(action)).then(
      (outcome) => {
        signal.set(outcome);
      },
      (error) => {
        logger.error({ event: 'recording_action_failed', action, message: errorMessage(error) });
        signal.set({ status: 'error', action, message: errorMessage(error) });
      }
    );
    return signal;
  }

  start(): Promise<ActionOutcome> {
    return this.executor.run(() => this.execute('start'));
  }

  stop(): Promise<ActionOutcome> {
    return this.executor.run(() => this.execute('stop'));
  }

  cancel(): Promise<ActionOutcome> {
    return this.executor.run(() => this.execute('cancel'));
  }

  toggle(): Promise<ActionOutcome> {
    return this.executor.run(() => this.execute('toggle'));
  }

  snapshot(): RecordingSnapshot {
    const snapshot: RecordingSnapshot = {
      state: this.state,
      recording: this.state === 'active',
      text: this.transcript,
      lastText: this.lastText,
      lastDuration: roundDuration(this.lastDuration),
    };
    if (this.state === 'active' && this.startedAt !== null) {
      snapshot.elapsed = roundDuration(this.elapsedSec());
    }
    return snapshot;
  }

  /** Cancels an active recording; used on process exit. */
  async shutdown(): Promise<void> {
    await this.executor.run(async () => {
      if (this.state === 'active') {
        await this.handleCancel();
      }
    });
  }

  private execute(action: RecordingAction): Promise<ActionOutcome> | ActionOutcome {
    switch (action) {
      case 'start':
        return this.handleStart();
      case 'stop':
        return this.handleStop();
      case 'cancel':
        return this.handleCancel();
      case 'toggle':
        return this.state === 'idle' ? this.handleStart() : this.handleStop();
    }
  }

  private async handleStart(): Promise<ActionOutcome> {
    if (this.state !== 'idle') {
      logger.info({ event: 'recording_start_conflict', state: this.state });
      return { status: 'already_recording', action: 'start' };
    }

    let session: RecognitionSession;
    try {
      session = this.options.createSession({
        onText: (text) => this.applyTranscript(session, text),
        onEnd: (info) => this.handleSessionEnd(session, info),
      });
    } catch (error) {
      logger.error({ event: 'recording_start_failed', message: errorMessage(error) });
      return { status: 'error', action: 'start', message: errorMessage(error) };
    }

    this.transcript = '';
    this.startedAt = this.now();
    this.session = session;
    this.state = 'active';
    session.start();

    try {
      this.options.audioSource.start(
        (chunk) => this.forwardAudio(session, chunk),
        (error) => logger.warn({ event: 'audio_capture_error', requestId: session.requestId, message: error.message })
      );
    } catch (error) {
      logger.error({ event: 'audio_capture_start_failed', message: errorMessage(error) });
      await session.stop(this.options.cancelTimeoutMs);
      this.session = null;
      this.state = 'idle';
      this.startedAt = null;
      return { status: 'error', action: 'start', message: errorMessage(error) };
    }

    this.options.presentation?.onRecordingStarted?.();
    logger.info({ event: 'recording_started', requestId: session.requestId });
    return { status: 'started', action: 'start' };
  }

  private async handleStop(): Promise<ActionOutcome> {
    const session = this.session;
    if (this.state !== 'active' || !session) {
      return this.notRecording('stop');
    }

    const duration = this.elapsedSec();
    this.state = 'finishing';
    this.stopCapture();
    try {
      const outcome = await session.finish(this.options.finishTimeoutMs);
      logger.debug({ event: 'recording_finish_outcome', requestId: session.requestId, outcome });
    } catch (error) {
      logger.error({ event: 'recording_finish_failed', requestId: session.requestId, message: errorMessage(error) });
    }

    const text = stripTrailingPunctuation(this.transcript);
    this.complete(text, duration);
    this.options.presentation?.onRecordingFinished?.({ text, durationSec: duration, cancelled: false });
    logger.info({ event: 'recording_stopped', requestId: session.requestId, chars: Array.from(text).length, duration });
    return {
      status: 'stopped',
      action: 'stop',
      text,
      duration: roundDuration(duration),
      chars: Array.from(text).length,
    };
  }

  private async handleCancel(): Promise<ActionOutcome> {
    const session = this.session;
    if (this.state !== 'active' || !session) {
      return this.notRecording('cancel');
    }

    const duration = this.elapsedSec();
    this.state = 'finishing';
    this.stopCapture();
    try {
      await session.stop(this.options.cancelTimeoutMs);
    } catch (error) {
      logger.error({ event: 'recording_cancel_failed', requestId: session.requestId, message: errorMessage(error) });
    }

    this.complete('', duration);
    this.options.presentation?.onRecordingFinished?.({ text: '', durationSec: duration, cancelled: true });
    logger.info({ event: 'recording_cancelled', requestId: session.requestId, duration });
    return { status: 'cancelled', action: 'cancel', duration: roundDuration(duration) };
  }

  private complete(text: string, duration: number) {
    this.lastText = text;
    this.lastDuration = duration;
    this.session = null;
    this.startedAt = null;
    this.state = 'idle';
  }

  private notRecording(action: 'stop' | 'cancel'): ActionOutcome {
    return {
      status: 'not_recording',
      action,
      text: this.lastText,
      duration: roundDuration(this.lastDuration),
    };
  }

  private elapsedSec(): number {
    if (this.startedAt === null) return 0;
    return Math.max(0, (this.now() - this.startedAt) / 1000);
  }

  private stopCapture() {
    void this.options.audioSource.stop().catch((error: unknown) => {
      logger.warn({ event: 'audio_capture_stop_failed', message: errorMessage(error) });
    });
  }

  private forwardAudio(session: RecognitionSession, chunk: Buffer) {
    if (this.session !== session || this.state !== 'active') return;
    session.feedAudio(chunk);
    this.options.presentation?.onSamples?.(chunk);
  }

  // Later results supersede earlier ones, including the high-accuracy revision.
  private applyTranscript(session: RecognitionSession, text: string) {
    if (this.session !== session) return;
    this.transcript = text;
    this.options.presentation?.onTranscript(text);
  }

  private handleSessionEnd(session: RecognitionSession, info: SessionEndInfo) {
    if (this.session !== session || this.state !== 'active') return;
    // The recording stays active until stop/cancel; no reconnect is attempted.
    logger.warn({ event: 'recording_session_lost', requestId: info.requestId, reason: info.reason, error: info.error });
  }
}
