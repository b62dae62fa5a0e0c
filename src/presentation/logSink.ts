import { logger } from '../logger.js';
import type { CompletedRecording, PresentationSink } from '../types.js';

const INT16_FULL_SCALE = 32768;

/** Peak absolute amplitude of s16le samples, scaled to 0..1. */
export function peakLevel(chunk: Buffer): number {
  let peak = 0;
  for (let offset = 0; offset + 1 < chunk.length; offset += 2) {
    const sample = Math.abs(chunk.readInt16LE(offset));
    if (sample > peak) peak = sample;
  }
  return Math.min(1, peak / INT16_FULL_SCALE);
}

/**
 * Headless stand-in for the overlay window: logs what a UI would show and
 * keeps the current input level for status queries.
 */
export class LogPresentationSink implements PresentationSink {
  private currentLevel = 0;
  private latestText = '';

  get level(): number {
    return this.currentLevel;
  }

  get text(): string {
    return this.latestText;
  }

  onRecordingStarted(): void {
    this.currentLevel = 0;
    this.latestText = '';
    logger.info({ event: 'ui_recording_started' });
  }

  onTranscript(text: string): void {
    this.latestText = text;
    logger.debug({ event: 'ui_transcript', chars: Array.from(text).length, text });
  }

  onSamples(chunk: Buffer): void {
    this.currentLevel = peakLevel(chunk);
  }

  onRecordingFinished(result: CompletedRecording): void {
    this.currentLevel = 0;
    logger.info({
      event: result.cancelled ? 'ui_recording_cancelled' : 'ui_recording_finished',
      chars: Array.from(result.text).length,
      durationSec: result.durationSec,
    });
  }
}
