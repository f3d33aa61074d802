import type { ChatTurn } from './chatClient';

export interface BilingualReplyInput {
  text?: string;
  zh?: string;
  ja?: string;
  history?: ChatTurn[];
}

export interface BilingualReply {
  zh: string;
  ja: string;
  history: ChatTurn[];
}

/**
 * Placeholder for a Chinese/Japanese reply pair. Nothing is translated yet:
 * whichever text is present fills both sides.
 */
export function replyBilingual(input: BilingualReplyInput): BilingualReply {
  const text = (input.text || input.zh || input.ja || '').trim();
  const zh = (input.zh || text).trim();
  const ja = (input.ja || text).trim();
  const history: ChatTurn[] = [...(input.history ?? []), { role: 'assistant', content: ja }];
  return { zh, ja, history };
}
