export type StreamingSessionState = 'connecting' | 'handshaking' | 'streaming' | 'closing' | 'closed';

export type SessionEndReason =
  | 'last_package'
  | 'remote_error'
  | 'transport_closed'
  | 'decode_error'
  | 'connect_failed'
  | 'cancelled';

export interface SessionStats {
  segmentsSent: number;
  finalSent: boolean;
  framesReceived: number;
  /** Last sequence value put on the wire; negative once the terminal frame is out. */
  lastSequence: number;
}

export interface SessionEndInfo {
  requestId: string;
  reason: SessionEndReason;
  error?: string;
  stats: SessionStats;
}

export type FinishOutcome = 'completed' | 'forced';

export interface SessionCallbacks {
  onText: (text: string) => void;
  onEnd?: (info: SessionEndInfo) => void;
}

/** One recognition connection, from handshake to close. */
export interface RecognitionSession {
  readonly requestId: string;
  readonly state: StreamingSessionState;
  start(): void;
  feedAudio(chunk: Buffer): void;
  /** Graceful: terminal frame, then wait for the recognizer's last package. */
  finish(timeoutMs?: number): Promise<FinishOutcome>;
  /** Forced: close the socket without waiting; true if it wound down in time. */
  stop(timeoutMs?: number): Promise<boolean>;
}

export type SessionFactory = (callbacks: SessionCallbacks) => RecognitionSession;

/** Push-style PCM source (mono s16le). */
export interface AudioSource {
  start(onChunk: (chunk: Buffer) => void, onError: (err: Error) => void): void;
  stop(): Promise<void>;
}

export interface CompletedRecording {
  text: string;
  durationSec: number;
  cancelled: boolean;
}

/** Receives what a window or overlay would render. */
export interface PresentationSink {
  onTranscript(text: string): void;
  onSamples?(chunk: Buffer): void;
  onRecordingStarted?(): void;
  onRecordingFinished?(result: CompletedRecording): void;
}

export type RecordingState = 'idle' | 'active' | 'finishing';

export type RecordingAction = 'start' | 'stop' | 'cancel' | 'toggle';

export type ActionOutcome =
  | { status: 'started'; action: 'start' }
  | { status: 'already_recording'; action: 'start' }
  | { status: 'stopped'; action: 'stop'; text: string; duration: number; chars: number }
  | { status: 'cancelled'; action: 'cancel'; duration: number }
  | { status: 'not_recording'; action: 'stop' | 'cancel'; text: string; duration: number }
  | { status: 'error'; action: RecordingAction; message: string };

export interface RecordingSnapshot {
  state: RecordingState;
  recording: boolean;
  /** Running transcript of the current recording. */
  text: string;
  /** Seconds since start, while a recording is active. */
  elapsed?: number;
  lastText: string;
  lastDuration: number;
}
