import { randomUUID } from 'node:crypto';
import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { z } from 'zod';
import { logger } from '../logger.js';
import { errorMessage, TransportError } from '../errors.js';
import { buildAudioOnlyRequest, buildFullClientRequest, parseResponse } from '../protocol/codec.js';
import type { HandshakeOptions, ServerResponse } from '../protocol/codec.js';
import { AudioSegmenter, segmentSizeBytes } from '../protocol/segmenter.js';
import { AsyncQueue } from '../utils/asyncQueue.js';
import { settlesWithin, withTimeout } from '../utils/timeout.js';
import type { AsrCredentials } from '../utils/env.js';
import type { SessionTimingConfig } from '../config.js';
import type {
  FinishOutcome,
  RecognitionSession,
  SessionCallbacks,
  SessionEndReason,
  SessionStats,
  StreamingSessionState,
} from '../types.js';

const HANDSHAKE_SEQUENCE = 1;
const FIRST_AUDIO_SEQUENCE = 1;

const STOP = Symbol('stop');
type AudioQueueItem = Buffer | typeof STOP;

type SocketEvent =
  | { kind: 'frame'; data: Buffer }
  | { kind: 'close'; code: number; reason: string }
  | { kind: 'error'; error: Error };

type SenderOutcome = 'final_sent' | 'cancelled' | 'failed';

const recognitionMessageSchema = z
  .object({
    result: z.object({ text: z.string().optional() }).passthrough(),
  })
  .passthrough();

/** Pulls `result.text` out of a decoded response body, if there is one. */
export function extractRecognizedText(message: unknown): string | undefined {
  const parsed = recognitionMessageSchema.safeParse(message);
  if (!parsed.success) return undefined;
  const text = parsed.data.result.text;
  return text && text.length > 0 ? text : undefined;
}

export function buildAuthHeaders(
  credentials: AsrCredentials,
  resourceId: string,
  requestId: string
): Record<string, string> {
  return {
    'X-Api-Resource-Id': resourceId,
    'X-Api-Request-Id': requestId,
    'X-Api-Access-Key': credentials.accessKey,
    'X-Api-App-Key': credentials.appKey,
  };
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export interface StreamingSessionOptions extends SessionCallbacks {
  url: string;
  resourceId: string;
  credentials: AsrCredentials;
  handshake: HandshakeOptions;
  sampleRate: number;
  segmentDurationMs: number;
  timing: SessionTimingConfig;
  requestId?: string;
}

/**
 * One recognizer connection. After the handshake a sender loop and a receiver
 * loop share the socket; both poll with bounded waits and stop at the next
 * poll boundary once the session's abort signal fires.
 */
export class StreamingSession implements RecognitionSession {
  readonly requestId: string;
  private currentState: StreamingSessionState = 'connecting';
  private readonly audioQueue = new AsyncQueue<AudioQueueItem>();
  private readonly inbound = new AsyncQueue<SocketEvent>();
  private readonly abort = new AbortController();
  private ws: WebSocket | null = null;
  private acceptingAudio = false;
  private forced = false;
  private senderFailure: string | undefined;
  private done: Promise<void> | null = null;
  private readonly stats: SessionStats = {
    segmentsSent: 0,
    finalSent: false,
    framesReceived: 0,
    lastSequence: 0,
  };

  constructor(private readonly options: StreamingSessionOptions) {
    this.requestId = options.requestId ?? randomUUID();
  }

  get state(): StreamingSessionState {
    return this.currentState;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  start(): void {
    if (this.done) {
      throw new Error('streaming session already started');
    }
    this.acceptingAudio = true;
    this.done = this.run();
  }

  /** Queues captured PCM; ignored once the session is finishing or closed. */
  feedAudio(chunk: Buffer): void {
    if (!this.acceptingAudio || chunk.length === 0) return;
    this.audioQueue.push(chunk);
  }

  async finish(timeoutMs = this.options.timing.finishTimeoutMs): Promise<FinishOutcome> {
    this.acceptingAudio = false;
    this.audioQueue.push(STOP);
    const done = this.done ?? Promise.resolve();
    if (await settlesWithin(done, timeoutMs)) {
      logger.debug({ event: 'asr_finish_completed', requestId: this.requestId });
      return 'completed';
    }

    logger.warn({ event: 'asr_finish_timeout', requestId: this.requestId, timeoutMs });
    this.forceClose();
    const graceMs = this.options.timing.forceCloseGraceMs;
    if (!(await settlesWithin(done, graceMs))) {
      logger.warn({ event: 'asr_finish_abandoned', requestId: this.requestId, graceMs });
    }
    return 'forced';
  }

  async stop(timeoutMs = this.options.timing.cancelTimeoutMs): Promise<boolean> {
    this.acceptingAudio = false;
    this.audioQueue.push(STOP);
    this.forceClose();
    const closed = await settlesWithin(this.done ?? Promise.resolve(), timeoutMs);
    if (!closed) {
      logger.warn({ event: 'asr_stop_timeout', requestId: this.requestId, timeoutMs });
    }
    return closed;
  }

  private transition(next: StreamingSessionState) {
    if (this.currentState === next || this.currentState === 'closed') return;
    logger.debug({ event: 'asr_state', requestId: this.requestId, from: this.currentState, to: next });
    this.currentState = next;
  }

  private forceClose() {
    this.forced = true;
    this.abort.abort();
    this.ws?.terminate();
  }

  private async run(): Promise<void> {
    let reason: SessionEndReason = 'cancelled';
    let failure: string | undefined;
    try {
      await this.connect();
      if (this.abort.signal.aborted) return;

      this.transition('handshaking');
      await this.sendFrame(buildFullClientRequest(HANDSHAKE_SEQUENCE, this.options.handshake));
      await this.awaitHandshakeResponse();
      if (this.abort.signal.aborted) return;

      this.transition('streaming');
      logger.info({ event: 'asr_streaming', requestId: this.requestId });
      reason = await this.stream();
    } catch (error) {
      failure = errorMessage(error);
      reason = this.currentState === 'connecting' ? 'connect_failed' : 'transport_closed';
      logger.warn({ event: 'asr_session_error', requestId: this.requestId, state: this.currentState, message: failure });
    } finally {
      if (this.forced) {
        reason = 'cancelled';
      }
      failure = failure ?? this.senderFailure;
      this.acceptingAudio = false;
      this.transition('closing');
      this.closeSocket();
      this.transition('closed');
      this.audioQueue.clear();
      logger.info({ event: 'asr_session_ended', requestId: this.requestId, reason, ...this.stats });
      this.notifyEnd(reason, failure);
    }
  }

  private connect(): Promise<void> {
    const { credentials, resourceId, url } = this.options;
    const ws = new WebSocket(url, {
      headers: buildAuthHeaders(credentials, resourceId, this.requestId),
    });
    this.ws = ws;

    ws.on('message', (data, isBinary) => {
      if (!isBinary) {
        logger.debug({ event: 'asr_text_frame_ignored', requestId: this.requestId });
        return;
      }
      this.inbound.push({ kind: 'frame', data: toBuffer(data) });
    });
    ws.on('close', (code, reason) => {
      this.inbound.push({ kind: 'close', code, reason: reason.toString() });
    });
    ws.on('error', (error) => {
      this.inbound.push({ kind: 'error', error });
    });

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        ws.off('open', onOpen);
        ws.off('error', onError);
        ws.off('close', onClose);
      };
      const onOpen = () => {
        cleanup();
        logger.info({ event: 'asr_connected', requestId: this.requestId });
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(new TransportError(`connect failed: ${error.message}`, error));
      };
      const onClose = () => {
        cleanup();
        reject(new TransportError('socket closed before open'));
      };
      ws.once('open', onOpen);
      ws.once('error', onError);
      ws.once('close', onClose);
    });
  }

  private sendFrame(frame: Buffer): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('socket is not open'));
    }
    const sent = new Promise<void>((resolve, reject) => {
      ws.send(frame, { binary: true }, (error) => {
        if (error) {
          reject(new TransportError(`send failed: ${error.message}`, error));
          return;
        }
        resolve();
      });
    });
    const { sendTimeoutMs } = this.options.timing;
    return withTimeout(sent, sendTimeoutMs, () => new TransportError(`send timed out after ${sendTimeoutMs}ms`));
  }

  /**
   * Waits for the reply to the handshake. Its content only confirms the
   * recognizer is alive, so a timeout or an undecodable reply still moves on.
   */
  private async awaitHandshakeResponse(): Promise<void> {
    const { handshakeTimeoutMs, receivePollMs } = this.options.timing;
    const deadline = Date.now() + handshakeTimeoutMs;
    const { signal } = this.abort;
    while (!signal.aborted) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        logger.warn({ event: 'asr_handshake_timeout', requestId: this.requestId, handshakeTimeoutMs });
        return;
      }
      const event = await this.inbound.poll(Math.min(receivePollMs, remaining), signal);
      if (!event) continue;
      if (event.kind === 'close') {
        throw new TransportError(`socket closed during handshake (code ${event.code})`);
      }
      if (event.kind === 'error') {
        throw new TransportError(`socket error during handshake: ${event.error.message}`, event.error);
      }
      try {
        const response = parseResponse(event.data);
        this.stats.framesReceived += 1;
        if (response.code !== 0) {
          logger.warn({ event: 'asr_handshake_error_code', requestId: this.requestId, code: response.code });
        } else {
          logger.debug({ event: 'asr_handshake_ack', requestId: this.requestId, sequence: response.sequence });
        }
      } catch (error) {
        logger.warn({ event: 'asr_handshake_malformed', requestId: this.requestId, message: errorMessage(error) });
      }
      return;
    }
  }

  private async stream(): Promise<SessionEndReason> {
    const sender = this.sendAudio();
    const receiver = this.receiveResponses();
    const first = await Promise.race([
      sender.then((outcome) => ({ task: 'sender' as const, outcome })),
      receiver.then((reason) => ({ task: 'receiver' as const, reason })),
    ]);
    // After the terminal frame the receiver keeps reading until the last package.
    if (first.task === 'receiver' || first.outcome !== 'final_sent') {
      this.transition('closing');
      this.abort.abort();
    }
    const [senderOutcome, receiverReason] = await Promise.all([sender, receiver]);
    this.transition('closing');
    if (senderOutcome === 'failed' && receiverReason === 'cancelled') {
      return 'transport_closed';
    }
    return receiverReason;
  }

  private async sendAudio(): Promise<SenderOutcome> {
    const { sampleRate, segmentDurationMs, timing } = this.options;
    const { signal } = this.abort;
    let sequence = FIRST_AUDIO_SEQUENCE;
    try {
      const segmenter = new AudioSegmenter(segmentSizeBytes(sampleRate, segmentDurationMs));
      for (;;) {
        if (signal.aborted) {
          logger.debug({ event: 'send_audio_cancelled', requestId: this.requestId });
          return 'cancelled';
        }
        const item = await this.audioQueue.poll(timing.audioPollMs, signal);
        if (item === undefined) continue;
        if (item === STOP) break;

        for (const segment of segmenter.push(item)) {
          await this.sendFrame(buildAudioOnlyRequest(sequence, segment));
          this.stats.segmentsSent += 1;
          this.stats.lastSequence = sequence;
          sequence += 1;
        }
      }

      const remainder = segmenter.drainFinal();
      await this.sendFrame(buildAudioOnlyRequest(sequence, remainder, true));
      this.stats.finalSent = true;
      this.stats.lastSequence = -sequence;
      logger.debug({
        event: 'send_audio_final_sent',
        requestId: this.requestId,
        sequence: -sequence,
        remainderBytes: remainder.length,
      });
      return 'final_sent';
    } catch (error) {
      this.senderFailure = errorMessage(error);
      logger.warn({ event: 'send_audio_failed', requestId: this.requestId, sequence, message: this.senderFailure });
      return 'failed';
    }
  }

  private async receiveResponses(): Promise<SessionEndReason> {
    const { receivePollMs } = this.options.timing;
    const { signal } = this.abort;
    while (!signal.aborted) {
      const event = await this.inbound.poll(receivePollMs, signal);
      if (!event) continue;
      if (event.kind === 'close') {
        logger.info({ event: 'receive_socket_closed', requestId: this.requestId, code: event.code });
        return 'transport_closed';
      }
      if (event.kind === 'error') {
        logger.warn({ event: 'receive_socket_error', requestId: this.requestId, message: event.error.message });
        return 'transport_closed';
      }

      let response: ServerResponse;
      try {
        response = parseResponse(event.data);
      } catch (error) {
        logger.warn({ event: 'receive_decode_failed', requestId: this.requestId, message: errorMessage(error) });
        return 'decode_error';
      }
      this.stats.framesReceived += 1;

      const text = extractRecognizedText(response.message);
      if (text) {
        this.deliverText(text);
      }
      if (response.isLast) {
        logger.debug({ event: 'receive_last_package', requestId: this.requestId, sequence: response.sequence });
        return 'last_package';
      }
      if (response.code !== 0) {
        logger.warn({ event: 'receive_error_code', requestId: this.requestId, code: response.code });
        return 'remote_error';
      }
    }
    return 'cancelled';
  }

  private deliverText(text: string) {
    try {
      this.options.onText(text);
    } catch (error) {
      logger.error({ event: 'asr_text_callback_failed', requestId: this.requestId, message: errorMessage(error) });
    }
  }

  private notifyEnd(reason: SessionEndReason, failure: string | undefined) {
    try {
      this.options.onEnd?.({ requestId: this.requestId, reason, error: failure, stats: this.getStats() });
    } catch (error) {
      logger.error({ event: 'asr_end_callback_failed', requestId: this.requestId, message: errorMessage(error) });
    }
  }

  private closeSocket() {
    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000);
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }
  }
}
