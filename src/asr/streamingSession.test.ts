import { gzipSync } from 'node:zlib';
import { afterEach, describe, expect, it } from 'vitest';
import { buildAuthHeaders, extractRecognizedText, StreamingSession } from './streamingSession.js';
import { encodeServerResponse, MessageFlags, MessageType } from '../protocol/codec.js';
import type { HandshakeOptions } from '../protocol/codec.js';
import { FakeRecognizer } from '../testing/fakeRecognizer.js';
import type { FakeRecognizerOptions } from '../testing/fakeRecognizer.js';
import type { SessionTimingConfig } from '../config.js';
import type { SessionEndInfo } from '../types.js';

const handshake: HandshakeOptions = {
  uid: 'test-user',
  sampleRate: 16000,
  modelName: 'bigmodel',
  enableItn: true,
  enablePunc: true,
  enableDdc: true,
  showUtterances: true,
  enableNonstream: true,
  endWindowSizeMs: 3000,
};

const timing: SessionTimingConfig = {
  finishTimeoutMs: 1500,
  forceCloseGraceMs: 300,
  cancelTimeoutMs: 500,
  audioPollMs: 20,
  receivePollMs: 20,
  sendTimeoutMs: 1000,
  handshakeTimeoutMs: 1000,
};

async function waitFor(predicate: () => boolean, timeoutMs = 2000) {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

describe('StreamingSession', () => {
  let server: FakeRecognizer | null = null;

  const startServer = async (options: FakeRecognizerOptions = {}) => {
    server = await FakeRecognizer.start(options);
    return server;
  };

  const createSession = (
    url: string,
    overrides: Partial<SessionTimingConfig> = {},
    audio: { sampleRate?: number; segmentDurationMs?: number } = {}
  ) => {
    const texts: string[] = [];
    const ends: SessionEndInfo[] = [];
    const session = new StreamingSession({
      url,
      resourceId: 'test-resource',
      credentials: { appKey: 'test-app-key', accessKey: 'test-secret' },
      handshake,
      sampleRate: audio.sampleRate ?? 16000,
      segmentDurationMs: audio.segmentDurationMs ?? 200,
      timing: { ...timing, ...overrides },
      requestId: 'test-request-1',
      onText: (text) => texts.push(text),
      onEnd: (info) => ends.push(info),
    });
    return { session, texts, ends };
  };

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it('streams three full segments then a negated terminal frame', async () => {
    const recognizer = await startServer({ finalText: '你好，世界。' });
    const { session, texts, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(19200, 1));
    const outcome = await session.finish();

    expect(outcome).toBe('completed');
    expect(recognizer.frames[0].messageType).toBe(MessageType.CLIENT_FULL_REQUEST);
    expect(recognizer.frames[0].sequence).toBe(1);
    const audio = recognizer.audioFrames;
    expect(audio.map((frame) => frame.sequence)).toEqual([1, 2, 3, -4]);
    expect(audio.map((frame) => frame.flags)).toEqual([
      MessageFlags.POS_SEQUENCE,
      MessageFlags.POS_SEQUENCE,
      MessageFlags.POS_SEQUENCE,
      MessageFlags.NEG_WITH_SEQUENCE,
    ]);
    expect(audio.map((frame) => frame.payload.length)).toEqual([6400, 6400, 6400, 0]);
    expect(texts).toEqual(['你好，世界。']);
    expect(ends).toHaveLength(1);
    expect(ends[0].reason).toBe('last_package');
    expect(session.state).toBe('closed');
    expect(session.getStats()).toMatchObject({ segmentsSent: 3, finalSent: true, lastSequence: -4 });
  });

  it('sends the authentication headers and handshake body', async () => {
    const recognizer = await startServer();
    const { session } = createSession(recognizer.url);

    session.start();
    await session.finish();

    const headers = recognizer.handshakeHeaders[0];
    expect(headers['x-api-app-key']).toBe('test-app-key');
    expect(headers['x-api-access-key']).toBe('test-secret');
    expect(headers['x-api-resource-id']).toBe('test-resource');
    expect(headers['x-api-request-id']).toBe('test-request-1');
    const body = JSON.parse(recognizer.frames[0].payload.toString('utf-8'));
    expect(body.audio).toEqual({ format: 'pcm', codec: 'raw', rate: 16000, bits: 16, channel: 1 });
    expect(body.request.end_window_size).toBe(3000);
  });

  it('carries partial bytes across uneven chunks into the terminal frame', async () => {
    const recognizer = await startServer();
    const { session } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(5000));
    session.feedAudio(Buffer.alloc(5000));
    session.feedAudio(Buffer.alloc(5000));
    await session.finish();

    const audio = recognizer.audioFrames;
    expect(audio.map((frame) => frame.sequence)).toEqual([1, 2, -3]);
    expect(audio.map((frame) => frame.payload.length)).toEqual([6400, 6400, 2200]);
  });

  it('delivers each progressive result in order', async () => {
    const recognizer = await startServer({
      finalText: 'final text.',
      replyToAudio: (frame, index) =>
        encodeServerResponse({ sequence: frame.sequence, message: { result: { text: `partial ${index}` } } }),
    });
    const { session, texts } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(12800));
    await session.finish();

    expect(texts).toEqual(['partial 0', 'partial 1', 'final text.']);
  });

  it('ignores audio fed after finish', async () => {
    const recognizer = await startServer();
    const { session } = createSession(recognizer.url);

    session.start();
    await session.finish();
    session.feedAudio(Buffer.alloc(6400));

    expect(recognizer.audioFrames.map((frame) => frame.sequence)).toEqual([-1]);
  });

  it('closes promptly on a forced stop before any audio', async () => {
    const recognizer = await startServer();
    const { session, ends } = createSession(recognizer.url);

    session.start();
    const closed = await session.stop();

    expect(closed).toBe(true);
    expect(session.state).toBe('closed');
    expect(ends[0].reason).toBe('cancelled');
    expect(recognizer.audioFrames).toHaveLength(0);
  });

  it('ends with transport_closed when the recognizer drops the connection', async () => {
    const recognizer = await startServer();
    const { session, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    await recognizer.waitForFrames(2);
    recognizer.dropConnections();
    await waitFor(() => ends.length === 1);

    expect(ends[0].reason).toBe('transport_closed');
    expect(session.state).toBe('closed');
    expect(await session.finish()).toBe('completed');
  });

  it('ends with remote_error on an error response', async () => {
    const recognizer = await startServer({
      replyToAudio: () => encodeServerResponse({ errorCode: 45000081, message: { error: 'quota exceeded' } }),
    });
    const { session, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    await waitFor(() => ends.length === 1);

    expect(ends[0].reason).toBe('remote_error');
    expect(session.state).toBe('closed');
  });

  it('reports connect_failed when nothing is listening', async () => {
    const recognizer = await startServer();
    const url = recognizer.url;
    await recognizer.close();
    server = null;
    const { session, ends } = createSession(url);

    session.start();
    await waitFor(() => ends.length === 1);

    expect(ends[0].reason).toBe('connect_failed');
    expect(ends[0].error).toMatch(/connect failed/);
  });

  it('forces the socket closed when the last package never arrives', async () => {
    const recognizer = await startServer({ ackFinal: false });
    const { session, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(100));
    const outcome = await session.finish(200);

    expect(outcome).toBe('forced');
    expect(session.state).toBe('closed');
    expect(ends[0].reason).toBe('cancelled');
    await recognizer.waitForFrames(2);
    expect(recognizer.audioFrames.map((frame) => frame.sequence)).toEqual([-1]);
    expect(recognizer.audioFrames[0].payload.length).toBe(100);
  });

  it('moves on to streaming when the handshake reply never comes', async () => {
    const recognizer = await startServer({ ackHandshake: false, finalText: 'ok' });
    const { session, texts } = createSession(recognizer.url, { handshakeTimeoutMs: 100 });

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    const outcome = await session.finish();

    expect(outcome).toBe('completed');
    expect(texts).toEqual(['ok']);
    expect(recognizer.audioFrames.map((frame) => frame.sequence)).toEqual([1, -2]);
  });

  it('keeps receiving after a reply with a corrupt gzip body', async () => {
    const recognizer = await startServer({
      finalText: 'done',
      replyToAudio: (frame) => encodeServerResponse({ sequence: frame.sequence, rawPayload: Buffer.from('not gzip') }),
    });
    const { session, texts, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    const outcome = await session.finish();

    expect(outcome).toBe('completed');
    expect(texts).toEqual(['done']);
    expect(ends[0].reason).toBe('last_package');
  });

  it('keeps receiving after a reply whose body is not JSON', async () => {
    const recognizer = await startServer({
      finalText: 'done',
      replyToAudio: (frame) =>
        encodeServerResponse({ sequence: frame.sequence, rawPayload: gzipSync(Buffer.from('{oops')) }),
    });
    const { session, texts, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    await session.finish();

    expect(texts).toEqual(['done']);
    expect(ends[0].reason).toBe('last_package');
  });

  it('ends with decode_error on a frame too short for its header', async () => {
    const recognizer = await startServer({ replyToAudio: () => Buffer.from([0x11]) });
    const { session, ends } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    await waitFor(() => ends.length === 1);

    expect(ends[0].reason).toBe('decode_error');
    expect(session.state).toBe('closed');
  });

  it('streams even when the handshake reply cannot be decoded', async () => {
    const recognizer = await startServer({ handshakeReply: Buffer.from([0x11]), finalText: 'ok' });
    const { session, texts } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    const outcome = await session.finish();

    expect(outcome).toBe('completed');
    expect(texts).toEqual(['ok']);
    expect(recognizer.audioFrames.map((frame) => frame.sequence)).toEqual([1, -2]);
  });

  it('stays streaming while it waits for the last package', async () => {
    const recognizer = await startServer({ ackFinal: false });
    const { session } = createSession(recognizer.url);

    session.start();
    session.feedAudio(Buffer.alloc(100));
    const finishing = session.finish(300);
    await recognizer.waitForFrames(2);

    expect(session.state).toBe('streaming');
    expect(await finishing).toBe('forced');
    expect(session.state).toBe('closed');
  });

  it('reports a segment size that is not whole samples as a sender failure', async () => {
    const recognizer = await startServer();
    const { session, ends } = createSession(recognizer.url, {}, { sampleRate: 22050, segmentDurationMs: 30 });

    session.start();
    session.feedAudio(Buffer.alloc(6400));
    await waitFor(() => ends.length === 1);

    expect(ends[0].reason).toBe('transport_closed');
    expect(ends[0].error).toBe('segment size must be a positive whole number of samples, got 1323');
    expect(recognizer.audioFrames).toHaveLength(0);
  });

  it('refuses to start twice', async () => {
    const recognizer = await startServer();
    const { session } = createSession(recognizer.url);

    session.start();
    expect(() => session.start()).toThrow('already started');
    await session.stop();
  });
});

describe('extractRecognizedText', () => {
  it('returns non-empty result text only', () => {
    expect(extractRecognizedText({ result: { text: 'hello', utterances: [] } })).toBe('hello');
    expect(extractRecognizedText({ result: { text: '' } })).toBeUndefined();
    expect(extractRecognizedText({ result: {} })).toBeUndefined();
    expect(extractRecognizedText({ audio_info: { duration: 10 } })).toBeUndefined();
    expect(extractRecognizedText(undefined)).toBeUndefined();
  });
});

describe('buildAuthHeaders', () => {
  it('maps credentials to the recognizer header names', () => {
    expect(buildAuthHeaders({ appKey: 'test-app-key', accessKey: 'test-secret' }, 'test-resource', 'req-1')).toEqual({
      'X-Api-Resource-Id': 'test-resource',
      'X-Api-Request-Id': 'req-1',
      'X-Api-Access-Key': 'test-secret',
      'X-Api-App-Key': 'test-app-key',
    });
  });
});
