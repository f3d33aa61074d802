import { Router } from 'express';
import { z } from 'zod';
import { replyBilingual } from '../ai/bilingualReply';
import type { ChatCompleter } from '../ai/chatClient';
import { asyncHandler, validateBody } from '../middleware';

const chatTurnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

const chatBodySchema = z.object({
  messages: z.array(chatTurnSchema).default([]),
});

const bilingualBodySchema = z.object({
  text: z.string().nullish(),
  zh: z.string().nullish(),
  ja: z.string().nullish(),
  history: z.array(chatTurnSchema).nullish(),
});

export function createChatRouter(deps: { chat: ChatCompleter }): Router {
  const router = Router();

  // `/qwen3` is the path older display clients call.
  router.post(
    ['/chat', '/qwen3'],
    asyncHandler(async (req, res) => {
      const { messages } = validateBody(chatBodySchema, req.body ?? {});
      res.json(await deps.chat.complete(messages));
    }),
  );

  router.post('/reply_bi', (req, res) => {
    const body = validateBody(bilingualBodySchema, req.body ?? {});
    res.json(
      replyBilingual({
        text: body.text ?? undefined,
        zh: body.zh ?? undefined,
        ja: body.ja ?? undefined,
        history: body.history ?? undefined,
      }),
    );
  });

  return router;
}
