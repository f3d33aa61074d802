/**
 * End-to-end tests for the HTTP surface: /tts, /say, /pat, /chat, /reply_bi, /health.
 *
 * VOICEVOX and Ollama are either unreachable (a released local port) or
 * replaced by in-process stubs; audio lands in a temporary voices dir.
 */

import assert from 'node:assert/strict';
import http from 'node:http';
import { readdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { after, afterEach, before, beforeEach, describe, it } from 'node:test';
import type { ChatCompleter, ChatTurn } from '../src/ai/chatClient';
import { parseEnv } from '../src/env';
import { buildServer } from '../src/server';
import { CacheStore, fingerprintOf, MIN_VIABLE_AUDIO_BYTES } from '../src/tts/cacheStore';
import { renderMockTone } from '../src/tts/mockSynth';
import { SynthesisResolver } from '../src/tts/resolver';
import { VoicevoxClient } from '../src/tts/voicevox';
import { makeTempDir, portOf, sendJson, startStubServer, unusedPortUrl, type StubServer } from './helpers';

/** Chat stand-in that echoes, the way the real client degrades when Ollama is down. */
const echoChat: ChatCompleter = {
  async complete(messages: ChatTurn[]) {
    const last = messages[messages.length - 1]?.content ?? '';
    return { response: last, history: [...messages, { role: 'assistant', content: last }] };
  },
};

interface TestContext {
  server: http.Server;
  baseUrl: string;
  voicesDir: string;
}

async function startApp(opts: {
  voicesDir: string;
  voicevoxUrl: string;
  ollamaUrl: string;
  createVoicesDir?: boolean;
}): Promise<TestContext> {
  const config = parseEnv({
    NODE_ENV: 'test',
    VOICES_DIR: opts.voicesDir,
    VOICEVOX_ENDPOINT: opts.voicevoxUrl,
    OLLAMA_ENDPOINT: opts.ollamaUrl,
    VOICEVOX_PROBE_TIMEOUT_MS: '1000',
  });
  const cache = new CacheStore(config.VOICES_DIR);
  if (opts.createVoicesDir ?? true) cache.ensureRoot();
  const voicevox = new VoicevoxClient(
    { endpoint: config.VOICEVOX_ENDPOINT, speaker: config.VOICEVOX_SPEAKER, probeTimeoutMs: 1000 },
    cache,
  );
  const resolver = new SynthesisResolver({ cache, primary: voicevox, preferredBackend: config.TTS_BACKEND });
  const { server } = buildServer({ config, chat: echoChat, resolver, voicesDir: cache.root });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  return { server, baseUrl: `http://127.0.0.1:${portOf(server)}`, voicesDir: cache.root };
}

async function stopApp(ctx: TestContext): Promise<void> {
  ctx.server.closeAllConnections();
  await new Promise<void>((resolve) => ctx.server.close(() => resolve()));
}

const jsonObject = z.record(z.unknown());

const healthBody = z.object({
  status: z.string(),
  checks: z.object({
    storage: z.object({ ok: z.boolean() }),
    voicevox: z.object({ ok: z.boolean() }).optional(),
    chat: z.object({ ok: z.boolean() }),
  }),
});

async function readJson(res: Response): Promise<Record<string, unknown>> {
  return jsonObject.parse(await res.json());
}

async function post(ctx: TestContext, route: string, body?: unknown): Promise<{ status: number; body: Record<string, unknown> }> {
  const res = await fetch(`${ctx.baseUrl}${route}`, {
    method: 'POST',
    headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  });
  return { status: res.status, body: await readJson(res) };
}

describe('voice HTTP surface with VOICEVOX unreachable', () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;
  let ctx: TestContext;

  beforeEach(async () => {
    tmp = await makeTempDir();
    const offline = await unusedPortUrl();
    ctx = await startApp({ voicesDir: path.join(tmp.dir, 'voices'), voicevoxUrl: offline, ollamaUrl: offline });
  });

  afterEach(async () => {
    await stopApp(ctx);
    await tmp.cleanup();
  });

  it('POST /say with text answers with a mock wav and a subtitle', async () => {
    const res = await post(ctx, '/say', { text: 'hello' });

    assert.equal(res.status, 200);
    assert.deepEqual(res.body, {
      wav_path: path.join(ctx.voicesDir, `${fingerprintOf('hello')}_mock.wav`),
      subtitle_zh: 'hello',
      backend: 'mock',
    });
    assert.ok((await stat(String(res.body.wav_path))).size >= MIN_VIABLE_AUDIO_BYTES);
  });

  it('POST /tts twice serves the second call from cache', async () => {
    const first = await post(ctx, '/tts', { spokenText: 'こんにちは' });
    const second = await post(ctx, '/tts', { spokenText: 'こんにちは' });

    assert.equal(first.status, 200);
    assert.equal(first.body.backend, 'mock');
    assert.equal(second.status, 200);
    assert.equal(second.body.backend, 'cache');
    assert.equal(second.body.wav_path, first.body.wav_path);
    assert.equal(first.body.subtitle_zh, '');
    assert.equal('error' in first.body, false);
  });

  it('POST /tts with blank spoken text is a client error and writes nothing', async () => {
    const res = await post(ctx, '/tts', { spokenText: '' });

    assert.equal(res.status, 400);
    assert.equal(res.body.error, 'empty_spoken_text');
    assert.deepEqual(await readdir(ctx.voicesDir), []);
  });

  it('POST /tts accepts the legacy ja/zh field names', async () => {
    const res = await post(ctx, '/tts', { ja: 'おやすみ', zh: '晚安' });

    assert.equal(res.status, 200);
    assert.equal(res.body.subtitle_zh, '晚安');
    assert.equal(res.body.wav_path, path.join(ctx.voicesDir, `${fingerprintOf('おやすみ')}_mock.wav`));
  });

  it('POST /tts treats null optional fields as absent', async () => {
    const res = await post(ctx, '/tts', { spokenText: 'こんにちは', subtitleText: null });

    assert.equal(res.status, 200);
    assert.deepEqual(res.body, {
      wav_path: path.join(ctx.voicesDir, `${fingerprintOf('こんにちは')}_mock.wav`),
      subtitle_zh: '',
      backend: 'mock',
    });
  });

  it('POST /say treats null fields as absent', async () => {
    const res = await post(ctx, '/say', { text: 'hello', spokenText: null, subtitleText: null, ja: null, zh: null });

    assert.equal(res.status, 200);
    assert.equal(res.body.subtitle_zh, 'hello');
    assert.equal(res.body.wav_path, path.join(ctx.voicesDir, `${fingerprintOf('hello')}_mock.wav`));
  });

  it('POST /tts rejects a non-string spoken text', async () => {
    const res = await post(ctx, '/tts', { spokenText: 42 });

    assert.equal(res.status, 400);
    assert.equal(res.body.error, 'validation_error');
  });

  it('malformed JSON is a validation error', async () => {
    const res = await post(ctx, '/tts', '{"spokenText": ');

    assert.equal(res.status, 400);
    assert.equal(res.body.error, 'validation_error');
  });

  it('POST /say with a pre-formed utterance skips chat', async () => {
    const res = await post(ctx, '/say', { spokenText: 'ありがとう', subtitleText: '谢谢' });

    assert.equal(res.status, 200);
    assert.equal(res.body.subtitle_zh, '谢谢');
    assert.equal(res.body.wav_path, path.join(ctx.voicesDir, `${fingerprintOf('ありがとう')}_mock.wav`));
  });

  it('POST /say with an empty body voices the placeholder line', async () => {
    const res = await post(ctx, '/say', {});

    assert.equal(res.status, 200);
    assert.equal(res.body.subtitle_zh, 'テストです');
  });

  it('POST /pat produces a wav and a subtitle', async () => {
    const res = await post(ctx, '/pat');

    assert.equal(res.status, 200);
    assert.equal(res.body.subtitle_zh, '頭をなでる');
    assert.equal(res.body.backend, 'mock');
    assert.ok((await stat(String(res.body.wav_path))).isFile());
  });

  it('POST /chat proxies the conversation', async () => {
    const res = await post(ctx, '/chat', { messages: [{ role: 'user', content: 'やあ' }] });

    assert.equal(res.status, 200);
    assert.deepEqual(res.body, {
      response: 'やあ',
      history: [
        { role: 'user', content: 'やあ' },
        { role: 'assistant', content: 'やあ' },
      ],
    });
  });

  it('POST /qwen3 is the same chat proxy', async () => {
    const res = await post(ctx, '/qwen3', { messages: [{ role: 'user', content: 'おはよう' }] });

    assert.equal(res.status, 200);
    assert.equal(res.body.response, 'おはよう');
  });

  it('POST /reply_bi accepts null fields', async () => {
    const res = await post(ctx, '/reply_bi', { text: null, zh: '你好', ja: null, history: null });

    assert.deepEqual(res.body, {
      zh: '你好',
      ja: '你好',
      history: [{ role: 'assistant', content: '你好' }],
    });
  });

  it('POST /reply_bi mirrors the text into both languages', async () => {
    const res = await post(ctx, '/reply_bi', { text: 'よしよし' });

    assert.deepEqual(res.body, {
      zh: 'よしよし',
      ja: 'よしよし',
      history: [{ role: 'assistant', content: 'よしよし' }],
    });
  });

  it('GET /health reports degraded while backends are down', async () => {
    const live = await fetch(`${ctx.baseUrl}/health/live`);
    assert.deepEqual(await readJson(live), { status: 'ok' });

    const res = await fetch(`${ctx.baseUrl}/health`);
    const body = healthBody.parse(await res.json());
    assert.equal(res.status, 200);
    assert.equal(body.status, 'degraded');
    assert.equal(body.checks.storage.ok, true);
    assert.equal(body.checks.voicevox?.ok, false);
    assert.equal(body.checks.chat.ok, false);
  });
});

describe('voice HTTP surface with a VOICEVOX stub', () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;
  let voicevox: StubServer;
  let ctx: TestContext;

  before(async () => {
    voicevox = await startStubServer((req, res) => {
      if (req.path === '/version') return sendJson(res, 200, '0.14.0');
      if (req.path === '/audio_query') return sendJson(res, 200, { accent_phrases: [], volumeScale: 1.0 });
      if (req.path === '/synthesis') {
        res.writeHead(200, { 'Content-Type': 'audio/wav' });
        res.end(renderMockTone({ frequencyHz: 330 }));
        return;
      }
      sendJson(res, 404, {});
    });
    tmp = await makeTempDir();
    ctx = await startApp({
      voicesDir: path.join(tmp.dir, 'voices'),
      voicevoxUrl: voicevox.url,
      ollamaUrl: await unusedPortUrl(),
    });
  });

  after(async () => {
    await stopApp(ctx);
    await voicevox.close();
    await tmp.cleanup();
  });

  it('POST /tts renders through VOICEVOX, then hits the cache without calling it', async () => {
    const first = await post(ctx, '/tts', { spokenText: 'いただきます', subtitleText: '我开动了' });
    const callsAfterFirst = voicevox.requests.length;
    const second = await post(ctx, '/tts', { spokenText: 'いただきます' });

    assert.deepEqual(first.body, {
      wav_path: path.join(ctx.voicesDir, `${fingerprintOf('いただきます')}.wav`),
      subtitle_zh: '我开动了',
      backend: 'voicevox',
    });
    assert.equal(second.body.backend, 'cache');
    assert.equal(second.body.wav_path, first.body.wav_path);
    assert.equal(voicevox.requests.length, callsAfterFirst);
  });
});

describe('voice HTTP surface with unwritable storage', () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;
  let ctx: TestContext;

  before(async () => {
    tmp = await makeTempDir();
    const blocker = path.join(tmp.dir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const offline = await unusedPortUrl();
    ctx = await startApp({
      voicesDir: path.join(blocker, 'voices'),
      voicevoxUrl: offline,
      ollamaUrl: offline,
      createVoicesDir: false,
    });
  });

  after(async () => {
    await stopApp(ctx);
    await tmp.cleanup();
  });

  it('POST /tts fails with a server error only when the mock fallback fails too', async () => {
    const res = await post(ctx, '/tts', { spokenText: 'だめ' });

    assert.equal(res.status, 500);
    assert.equal(res.body.error, 'tts_fatal');
  });

  it('GET /health is unhealthy', async () => {
    const res = await fetch(`${ctx.baseUrl}/health`);
    assert.equal(res.status, 503);
    assert.equal((await readJson(res)).status, 'unhealthy');
  });
});
