import type { Message } from '../types';

/**
 * Collapses consecutive messages from the same role into one, joining their content with a
 * newline so a single logical turn is not split across entries. Tool messages answer distinct
 * calls and are kept separate. Returns new objects; the input is left untouched.
 */
export function mergeMessageRuns(messages: readonly Message[]): Message[] {
  const merged: Message[] = [];
  for (const message of messages) {
    const last = merged[merged.length - 1];
    if (last && last.role === message.role && message.role !== 'tool') {
      merged[merged.length - 1] = { ...last, content: joinContent(last.content, message.content) };
      continue;
    }
    merged.push({ ...message });
  }
  return merged;
}

function joinContent(a: string, b: string): string {
  if (!a) return b;
  if (!b) return a;
  return `${a}\n${b}`;
}
