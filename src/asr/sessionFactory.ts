import type { AppConfig } from '../config.js';
import { requireAsrCredentials } from '../utils/env.js';
import type { HandshakeOptions } from '../protocol/codec.js';
import type { SessionFactory } from '../types.js';
import { StreamingSession } from './streamingSession.js';

export function handshakeOptionsFromConfig(config: AppConfig): HandshakeOptions {
  const { asr, audio } = config;
  return {
    uid: asr.uid,
    sampleRate: audio.sampleRate,
    modelName: asr.modelName,
    enableItn: asr.enableItn,
    enablePunc: asr.enablePunc,
    enableDdc: asr.enableDdc,
    showUtterances: asr.showUtterances,
    enableNonstream: asr.enableNonstream,
    endWindowSizeMs: asr.endWindowSizeMs,
  };
}

/**
 * Builds sessions against the configured recognizer. `getConfig` is read on
 * every call so a config reload applies to the next recording.
 */
export function createSessionFactory(getConfig: () => AppConfig): SessionFactory {
  return (callbacks) => {
    const config = getConfig();
    return new StreamingSession({
      ...callbacks,
      url: config.asr.url,
      resourceId: config.asr.resourceId,
      credentials: requireAsrCredentials(),
      handshake: handshakeOptionsFromConfig(config),
      sampleRate: config.audio.sampleRate,
      segmentDurationMs: config.audio.segmentDurationMs,
      timing: config.session,
    });
  };
}
