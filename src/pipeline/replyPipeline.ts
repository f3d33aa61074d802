import type { ChatCompleter } from '../ai/chatClient';
import { log } from '../log';
import type { SynthesisBackend, SynthesisOutcome, Utterance } from '../tts/types';

/** "This is a test": spoken when the caller gave nothing to say. */
export const PLACEHOLDER_TEXT = 'テストです';

export interface SpokenReplyInput {
  text?: string;
  spokenText?: string;
  subtitleText?: string;
}

export interface SpokenReply {
  artifactPath: string;
  subtitleText: string;
  backend: SynthesisBackend;
}

export interface UtteranceResolver {
  resolve(utterance: Utterance): Promise<SynthesisOutcome>;
}

export interface ReplyPipelineDeps {
  chat: ChatCompleter;
  resolver: UtteranceResolver;
  patText: string;
}

export class ReplyPipeline {
  constructor(private readonly deps: ReplyPipelineDeps) {}

  async produceSpokenReply(input: SpokenReplyInput): Promise<SpokenReply> {
    let spokenText = (input.spokenText ?? '').trim();
    let subtitleText = (input.subtitleText ?? '').trim();

    if (!spokenText) {
      const prompt = (input.text ?? '').trim() || PLACEHOLDER_TEXT;
      const chat = await this.deps.chat.complete([{ role: 'user', content: prompt }]);
      spokenText = chat.response.trim() || PLACEHOLDER_TEXT;
      if (!subtitleText) subtitleText = spokenText;
      log.debug({ event: 'reply_generated', prompt_chars: prompt.length }, 'reply generated via chat');
    }

    const outcome = await this.deps.resolver.resolve({ spokenText, subtitleText });
    return {
      artifactPath: outcome.artifactPath,
      subtitleText: subtitleText || spokenText,
      backend: outcome.backend,
    };
  }

  /** Head-pat gesture: a fixed line run through the full pipeline. */
  pat(): Promise<SpokenReply> {
    return this.produceSpokenReply({ text: this.deps.patText });
  }
}
