import { gunzipSync, gzipSync } from 'node:zlib';
import { ProtocolError } from '../errors.js';

export const PROTOCOL_VERSION = 0b0001;
export const HEADER_BYTES = 4;

export const MessageType = {
  CLIENT_FULL_REQUEST: 0b0001,
  CLIENT_AUDIO_ONLY_REQUEST: 0b0010,
  SERVER_FULL_RESPONSE: 0b1001,
  SERVER_ERROR_RESPONSE: 0b1111,
} as const;

export const MessageFlags = {
  NO_SEQUENCE: 0b0000,
  POS_SEQUENCE: 0b0001,
  NEG_SEQUENCE: 0b0010,
  NEG_WITH_SEQUENCE: 0b0011,
} as const;

export const Serialization = {
  NONE: 0b0000,
  JSON: 0b0001,
} as const;

export const Compression = {
  NONE: 0b0000,
  GZIP: 0b0001,
} as const;

const FLAG_HAS_SEQUENCE = 0b0001;
const FLAG_LAST_PACKAGE = 0b0010;
// Set by the server on some frames; the 4 bytes it announces are skipped, not interpreted.
const FLAG_EVENT_FIELD = 0b0100;

export interface FrameHeader {
  messageType: number;
  flags: number;
  serialization: number;
  compression: number;
}

export interface HandshakeOptions {
  uid: string;
  sampleRate: number;
  bits?: number;
  channels?: number;
  modelName: string;
  enableItn: boolean;
  enablePunc: boolean;
  enableDdc: boolean;
  showUtterances: boolean;
  enableNonstream: boolean;
  endWindowSizeMs: number;
}

export interface ServerResponse {
  messageType: number;
  flags: number;
  serialization: number;
  compression: number;
  /** Non-zero only for error responses. */
  code: number;
  isLast: boolean;
  sequence: number;
  payloadSize?: number;
  /** Decoded JSON body; undefined when absent or undecodable. */
  message?: unknown;
}

export interface DecodedRequest extends FrameHeader {
  sequence?: number;
  payload: Buffer;
}

export function encodeHeader(header: FrameHeader): Buffer {
  return Buffer.from([
    (PROTOCOL_VERSION << 4) | (HEADER_BYTES / 4),
    ((header.messageType & 0x0f) << 4) | (header.flags & 0x0f),
    ((header.serialization & 0x0f) << 4) | (header.compression & 0x0f),
    0x00,
  ]);
}

function encodeSequencedFrame(header: FrameHeader, sequence: number, body: Buffer): Buffer {
  const compressed = gzipSync(body);
  const fields = Buffer.alloc(8);
  fields.writeInt32BE(sequence, 0);
  fields.writeUInt32BE(compressed.length, 4);
  return Buffer.concat([encodeHeader(header), fields, compressed]);
}

export function buildHandshakePayload(options: HandshakeOptions) {
  return {
    user: { uid: options.uid },
    audio: {
      format: 'pcm',
      codec: 'raw',
      rate: options.sampleRate,
      bits: options.bits ?? 16,
      channel: options.channels ?? 1,
    },
    request: {
      model_name: options.modelName,
      enable_itn: options.enableItn,
      enable_punc: options.enablePunc,
      enable_ddc: options.enableDdc,
      show_utterances: options.showUtterances,
      enable_nonstream: options.enableNonstream,
      end_window_size: options.endWindowSizeMs,
    },
  };
}

/** Session-opening frame: JSON request options, gzip-compressed. */
export function buildFullClientRequest(sequence: number, options: HandshakeOptions): Buffer {
  const json = Buffer.from(JSON.stringify(buildHandshakePayload(options)), 'utf-8');
  return encodeSequencedFrame(
    {
      messageType: MessageType.CLIENT_FULL_REQUEST,
      flags: MessageFlags.POS_SEQUENCE,
      serialization: Serialization.JSON,
      compression: Compression.GZIP,
    },
    sequence,
    json
  );
}

/**
 * One audio segment. The terminal segment is flagged NEG_WITH_SEQUENCE and
 * carries the negated sequence value.
 */
export function buildAudioOnlyRequest(sequence: number, pcm: Buffer, isFinal = false): Buffer {
  return encodeSequencedFrame(
    {
      messageType: MessageType.CLIENT_AUDIO_ONLY_REQUEST,
      flags: isFinal ? MessageFlags.NEG_WITH_SEQUENCE : MessageFlags.POS_SEQUENCE,
      serialization: Serialization.JSON,
      compression: Compression.GZIP,
    },
    isFinal ? -sequence : sequence,
    pcm
  );
}

function readHeader(bytes: Buffer): { header: FrameHeader; offset: number } {
  if (bytes.length < HEADER_BYTES) {
    throw new ProtocolError(`frame too short for header: ${bytes.length} bytes`);
  }
  const headerWords = bytes[0] & 0x0f;
  const offset = headerWords * 4;
  if (headerWords === 0 || bytes.length < offset) {
    throw new ProtocolError(`invalid header size: ${headerWords} words for ${bytes.length} bytes`);
  }
  return {
    header: {
      messageType: bytes[1] >> 4,
      flags: bytes[1] & 0x0f,
      serialization: bytes[2] >> 4,
      compression: bytes[2] & 0x0f,
    },
    offset,
  };
}

function requireBytes(bytes: Buffer, offset: number, length: number, field: string) {
  if (bytes.length < offset + length) {
    throw new ProtocolError(`frame truncated reading ${field} at offset ${offset}`);
  }
}

/**
 * Decodes a server frame. A bad gzip or JSON body leaves `message` unset;
 * a truncated header or fixed-width field throws ProtocolError.
 */
export function parseResponse(bytes: Buffer): ServerResponse {
  const { header, offset: headerEnd } = readHeader(bytes);
  let offset = headerEnd;
  const response: ServerResponse = {
    ...header,
    code: 0,
    isLast: false,
    sequence: 0,
  };

  if (header.flags & FLAG_HAS_SEQUENCE) {
    requireBytes(bytes, offset, 4, 'sequence');
    response.sequence = bytes.readInt32BE(offset);
    offset += 4;
  }
  if (header.flags & FLAG_LAST_PACKAGE) {
    response.isLast = true;
  }
  if (header.flags & FLAG_EVENT_FIELD) {
    requireBytes(bytes, offset, 4, 'event field');
    offset += 4;
  }

  if (header.messageType === MessageType.SERVER_FULL_RESPONSE) {
    requireBytes(bytes, offset, 4, 'payload size');
    response.payloadSize = bytes.readUInt32BE(offset);
    offset += 4;
  } else if (header.messageType === MessageType.SERVER_ERROR_RESPONSE) {
    requireBytes(bytes, offset, 8, 'error code');
    response.code = bytes.readInt32BE(offset);
    response.payloadSize = bytes.readUInt32BE(offset + 4);
    offset += 8;
  }

  let payload = bytes.subarray(offset);
  if (payload.length === 0) {
    return response;
  }

  if (header.compression === Compression.GZIP) {
    try {
      payload = gunzipSync(payload);
    } catch {
      return response;
    }
  }

  if (header.serialization === Serialization.JSON) {
    try {
      const message: unknown = JSON.parse(payload.toString('utf-8'));
      response.message = message;
    } catch {
      return response;
    }
  }

  return response;
}

/** Inverse of the request builders; lets tests and stand-in servers read client frames. */
export function parseRequest(bytes: Buffer): DecodedRequest {
  const { header, offset: headerEnd } = readHeader(bytes);
  let offset = headerEnd;
  let sequence: number | undefined;
  if (header.flags & FLAG_HAS_SEQUENCE) {
    requireBytes(bytes, offset, 4, 'sequence');
    sequence = bytes.readInt32BE(offset);
    offset += 4;
  }
  requireBytes(bytes, offset, 4, 'payload size');
  const size = bytes.readUInt32BE(offset);
  offset += 4;
  requireBytes(bytes, offset, size, 'payload');
  const raw = bytes.subarray(offset, offset + size);
  const payload = header.compression === Compression.GZIP ? gunzipSync(raw) : Buffer.from(raw);
  return { ...header, sequence, payload };
}

export interface ServerFrameInput {
  sequence?: number;
  isLast?: boolean;
  /** Present only on error responses. */
  errorCode?: number;
  message?: unknown;
  /** Raw body bytes, sent as-is; overrides `message`. */
  rawPayload?: Buffer;
}

/** Builds server-side frames, the shape the recognizer sends back. */
export function encodeServerResponse(input: ServerFrameInput): Buffer {
  const isError = input.errorCode !== undefined;
  let flags = 0;
  if (input.sequence !== undefined) flags |= FLAG_HAS_SEQUENCE;
  if (input.isLast) flags |= FLAG_LAST_PACKAGE;

  const body =
    input.rawPayload ??
    (input.message === undefined ? Buffer.alloc(0) : gzipSync(Buffer.from(JSON.stringify(input.message), 'utf-8')));

  const parts: Buffer[] = [
    encodeHeader({
      messageType: isError ? MessageType.SERVER_ERROR_RESPONSE : MessageType.SERVER_FULL_RESPONSE,
      flags,
      serialization: Serialization.JSON,
      compression: Compression.GZIP,
    }),
  ];
  if (input.sequence !== undefined) {
    const seq = Buffer.alloc(4);
    seq.writeInt32BE(input.sequence, 0);
    parts.push(seq);
  }
  if (isError) {
    const code = Buffer.alloc(4);
    code.writeInt32BE(input.errorCode ?? 0, 0);
    parts.push(code);
  }
  const size = Buffer.alloc(4);
  size.writeUInt32BE(body.length, 0);
  parts.push(size, body);
  return Buffer.concat(parts);
}
