import OpenAI from 'openai';
import { log } from '../log';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface ChatReply {
  response: string;
  history: ChatTurn[];
}

export interface ChatCompleter {
  /** Never rejects: on failure the last user turn is echoed back. */
  complete(messages: ChatTurn[]): Promise<ChatReply>;
}

export interface ChatClientConfig {
  /** Ollama base URL; the OpenAI-compatible API lives under /v1. */
  endpoint: string;
  model: string;
  timeoutMs?: number;
}

function toMessageParam(turn: ChatTurn): OpenAI.Chat.ChatCompletionMessageParam {
  if (turn.role === 'system') return { role: 'system', content: turn.content };
  if (turn.role === 'assistant') return { role: 'assistant', content: turn.content };
  return { role: 'user', content: turn.content };
}

/** Content of the most recent user turn, or '' when there is none. */
export function lastUserContent(messages: ChatTurn[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') return messages[i].content;
  }
  return '';
}

/**
 * Single-shot chat completion against a local Ollama model, spoken to
 * through the OpenAI SDK.
 */
export class ChatClient implements ChatCompleter {
  private readonly openai: OpenAI;
  private readonly model: string;

  constructor(config: ChatClientConfig) {
    this.model = config.model;
    this.openai = new OpenAI({
      apiKey: 'ollama',
      baseURL: `${config.endpoint.replace(/\/+$/, '')}/v1`,
      timeout: config.timeoutMs ?? 30_000,
      maxRetries: 0,
    });
  }

  async complete(messages: ChatTurn[]): Promise<ChatReply> {
    try {
      const completion = await this.openai.chat.completions.create({
        model: this.model,
        messages: messages.map(toMessageParam),
        stream: false,
      });
      const reply = completion.choices[0]?.message?.content?.trim();
      if (!reply) {
        throw new Error('chat completion returned no reply');
      }
      log.info({ event: 'chat_reply', model: this.model, reply_chars: reply.length }, 'chat reply received');
      return { response: reply, history: [...messages, { role: 'assistant', content: reply }] };
    } catch (err) {
      const echo = lastUserContent(messages);
      log.warn({ err, event: 'chat_reply_failed', model: this.model }, 'chat backend failed, echoing last turn');
      return { response: echo, history: [...messages, { role: 'assistant', content: echo }] };
    }
  }
}
