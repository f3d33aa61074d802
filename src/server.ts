import http from 'http';
import express, { type Express } from 'express';
import { ChatClient, type ChatCompleter } from './ai/chatClient';
import { env as defaultEnv, type Env } from './env';
import { globalErrorHandler, requestIdMiddleware, requestLogger } from './middleware';
import { ReplyPipeline } from './pipeline/replyPipeline';
import { createChatRouter } from './routes/chat';
import { createHealthRouter } from './routes/health';
import { createVoiceRouter } from './routes/voice';
import { createTtsStack } from './tts';
import type { SynthesisResolver } from './tts/resolver';

export interface ServerDeps {
  config: Env;
  chat: ChatCompleter;
  resolver: Pick<SynthesisResolver, 'resolve'>;
  voicesDir: string;
}

/** Wires the default collaborators from env. Tests pass their own. */
export function createDefaultDeps(config: Env = defaultEnv): ServerDeps {
  const tts = createTtsStack(config);
  const chat = new ChatClient({
    endpoint: config.OLLAMA_ENDPOINT,
    model: config.OLLAMA_MODEL,
    timeoutMs: config.CHAT_TIMEOUT_MS,
  });
  return { config, chat, resolver: tts.resolver, voicesDir: tts.cache.root };
}

export function buildServer(deps: ServerDeps = createDefaultDeps()): {
  app: Express;
  server: http.Server;
  pipeline: ReplyPipeline;
} {
  const { config } = deps;
  const pipeline = new ReplyPipeline({ chat: deps.chat, resolver: deps.resolver, patText: config.PAT_TEXT });

  const app = express();
  app.use(express.json({ limit: '256kb' }));
  app.use(requestIdMiddleware);
  app.use(requestLogger);

  app.use('/health', createHealthRouter({
    voicesDir: deps.voicesDir,
    voicevoxEndpoint: config.VOICEVOX_ENDPOINT,
    ollamaEndpoint: config.OLLAMA_ENDPOINT,
    voicevoxEnabled: config.TTS_BACKEND === 'voicevox',
  }));
  app.use(createVoiceRouter({ resolver: deps.resolver, pipeline }));
  app.use(createChatRouter({ chat: deps.chat }));

  app.use(globalErrorHandler);

  const server = http.createServer(app);
  return { app, server, pipeline };
}
