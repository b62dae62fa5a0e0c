import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { once } from 'node:events';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import { logger } from '../logger.js';
import { ConfigError } from '../errors.js';
import { settlesWithin } from '../utils/timeout.js';
import type { AudioConfig } from '../config.js';
import type { AudioSource } from '../types.js';

const DEFAULT_STOP_TIMEOUT_MS = 1000;

export interface CaptureSettings {
  sampleRate: number;
  /** ffmpeg input device; platform default microphone when unset. */
  device?: string;
  platform?: NodeJS.Platform;
}

export interface FfmpegAudioSourceOptions {
  /** Read on every start so a config reload applies to the next recording. */
  getAudio: () => AudioConfig;
  platform?: NodeJS.Platform;
  stopTimeoutMs?: number;
}

export function captureInputArgs(platform: NodeJS.Platform, device?: string): string[] {
  switch (platform) {
    case 'darwin':
      return ['-f', 'avfoundation', '-i', device ?? ':0'];
    case 'win32':
      if (!device) {
        throw new ConfigError('audio.captureDevice is required on Windows (dshow device name)');
      }
      return ['-f', 'dshow', '-i', `audio=${device}`];
    default:
      return ['-f', 'pulse', '-i', device ?? 'default'];
  }
}

export function buildCaptureArgs(options: CaptureSettings): string[] {
  return [
    '-nostdin',
    '-hide_banner',
    '-v',
    'error',
    ...captureInputArgs(options.platform ?? process.platform, options.device),
    '-ac',
    '1',
    '-ar',
    String(options.sampleRate),
    '-f',
    's16le',
    '-flush_packets',
    '1',
    'pipe:1',
  ];
}

/** Microphone capture through an ffmpeg child process writing mono s16le to stdout. */
export class FfmpegAudioSource implements AudioSource {
  private proc: ChildProcess | null = null;

  constructor(private readonly options: FfmpegAudioSourceOptions) {}

  get running(): boolean {
    return this.proc !== null;
  }

  captureArgs(): string[] {
    const audio = this.options.getAudio();
    return buildCaptureArgs({
      sampleRate: audio.sampleRate,
      device: audio.captureDevice,
      platform: this.options.platform,
    });
  }

  start(onChunk: (chunk: Buffer) => void, onError: (err: Error) => void): void {
    if (this.proc) {
      throw new Error('audio capture is already running');
    }
    const args = this.captureArgs();
    const proc = spawn(ffmpegInstaller.path, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    this.proc = proc;
    logger.debug({ event: 'audio_capture_spawned', args });

    proc.stdout?.on('data', (chunk: Buffer) => onChunk(chunk));
    proc.stderr?.on('data', (data: Buffer) => {
      logger.debug({ event: 'audio_capture_stderr', line: data.toString().trim() });
    });
    proc.once('error', (error) => {
      if (this.proc === proc) this.proc = null;
      onError(error);
    });
    proc.once('close', (code, signal) => {
      if (this.proc !== proc) return;
      this.proc = null;
      onError(new Error(`ffmpeg capture exited unexpectedly (code ${code ?? 'null'}, signal ${signal ?? 'none'})`));
    });
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    this.proc = null;
    if (proc.exitCode !== null || proc.signalCode !== null) return;

    const closed = once(proc, 'close');
    proc.kill('SIGTERM');
    const timeoutMs = this.options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    if (!(await settlesWithin(closed, timeoutMs))) {
      logger.warn({ event: 'audio_capture_kill', timeoutMs });
      proc.kill('SIGKILL');
    }
  }
}
