import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, createApiError, validateBody } from '../middleware';
import type { ReplyPipeline, SpokenReply } from '../pipeline/replyPipeline';
import {
  EmptyUtteranceError,
  SynthesisFailedError,
  type SynthesisOutcome,
} from '../tts/types';
import type { SynthesisResolver } from '../tts/resolver';

// `ja`/`zh` are the field names older display clients send; they also send null for absent fields.
const ttsBodySchema = z.object({
  spokenText: z.string().nullish(),
  subtitleText: z.string().nullish(),
  ja: z.string().nullish(),
  zh: z.string().nullish(),
});

const sayBodySchema = ttsBodySchema.extend({
  text: z.string().nullish(),
});

export interface TtsResponseBody {
  wav_path: string;
  subtitle_zh: string;
  backend: SynthesisOutcome['backend'];
  error?: string;
}

export type SayResponseBody = Omit<TtsResponseBody, 'error'>;

export function toTtsResponse(outcome: SynthesisOutcome): TtsResponseBody {
  return {
    wav_path: outcome.artifactPath,
    subtitle_zh: outcome.subtitleText,
    backend: outcome.backend,
    ...(outcome.error ? { error: outcome.error } : {}),
  };
}

function toSayResponse(reply: SpokenReply): SayResponseBody {
  return { wav_path: reply.artifactPath, subtitle_zh: reply.subtitleText, backend: reply.backend };
}

function toApiError(err: unknown): unknown {
  if (err instanceof EmptyUtteranceError) {
    return createApiError(err.message, 400, 'empty_spoken_text');
  }
  if (err instanceof SynthesisFailedError) {
    return createApiError(err.message, 500, 'tts_fatal');
  }
  return err;
}

export interface VoiceRouterDeps {
  resolver: Pick<SynthesisResolver, 'resolve'>;
  pipeline: Pick<ReplyPipeline, 'produceSpokenReply' | 'pat'>;
}

export function createVoiceRouter(deps: VoiceRouterDeps): Router {
  const router = Router();

  router.post(
    '/tts',
    asyncHandler(async (req, res) => {
      const body = validateBody(ttsBodySchema, req.body ?? {});
      const spokenText = (body.spokenText ?? body.ja ?? '').trim();
      const subtitleText = (body.subtitleText ?? body.zh ?? '').trim();
      if (!spokenText) {
        throw createApiError('spoken text is empty', 400, 'empty_spoken_text');
      }

      try {
        const outcome = await deps.resolver.resolve({ spokenText, subtitleText });
        res.json(toTtsResponse(outcome));
      } catch (err) {
        throw toApiError(err);
      }
    }),
  );

  router.post(
    '/say',
    asyncHandler(async (req, res) => {
      const body = validateBody(sayBodySchema, req.body ?? {});
      try {
        const reply = await deps.pipeline.produceSpokenReply({
          text: body.text ?? undefined,
          spokenText: body.spokenText ?? body.ja ?? undefined,
          subtitleText: body.subtitleText ?? body.zh ?? undefined,
        });
        res.json(toSayResponse(reply));
      } catch (err) {
        throw toApiError(err);
      }
    }),
  );

  router.post(
    '/pat',
    asyncHandler(async (_req, res) => {
      try {
        res.json(toSayResponse(await deps.pipeline.pat()));
      } catch (err) {
        throw toApiError(err);
      }
    }),
  );

  return router;
}
