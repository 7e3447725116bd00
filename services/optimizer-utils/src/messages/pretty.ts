import { mergeMessageRuns } from './merge';
import type { Message, MessageRole } from '../types';

const TITLE_WIDTH = 80;

const ROLE_TITLES: Record<MessageRole, string> = {
  system: 'System',
  user: 'Human',
  assistant: 'Ai',
  tool: 'Tool',
};

/** `=== Human Message ===` style banner, centered in an 80-column rule. */
export function titleRepr(title: string): string {
  const padded = ` ${title} `;
  const sepLen = Math.floor((TITLE_WIDTH - padded.length) / 2);
  const sep = '='.repeat(Math.max(0, sepLen));
  const secondSep = padded.length % 2 ? `${sep}=` : sep;
  return `${sep}${padded}${secondSep}`;
}

export function prettyRepr(message: Message): string {
  let title = titleRepr(`${ROLE_TITLES[message.role]} Message`);
  if (message.name !== undefined) {
    title += `\nName: ${message.name}`;
  }
  return `${title}\n\n${message.content}`;
}

/** Human-readable transcript of one session. */
export function getConversation(messages: readonly Message[]): string {
  return mergeMessageRuns(messages)
    .map((m) => prettyRepr(m))
    .join('\n\n');
}
