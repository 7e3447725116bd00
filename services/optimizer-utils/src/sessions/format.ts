import { randomBytes } from 'crypto';
import { config } from '../config';
import { logger } from '../logger';
import { getConversation } from '../messages/pretty';
import { normalizeSessions } from './normalize';
import type { FormatSessionsOptions, SessionsInput } from '../contracts/sessions';

/**
 * Renders one or more conversations into a single block for an optimizer prompt:
 *
 * ```text
 * <session_{id}>
 * {transcript}
 *
 * Feedback for session {id}:
 * <FEEDBACK>
 * {feedback}
 * </FEEDBACK>
 * </session_{id}>
 * ```
 *
 * The feedback part appears only when feedback is non-empty. Blocks are separated by a blank
 * line in input order. Ids are fresh for every call.
 */
export function formatSessions(input: SessionsInput, options: FormatSessionsOptions = {}): string {
  const sessions = normalizeSessions(input);
  if (sessions.length === 0) return '';

  const nextId = options.idFactory ?? generateSessionId;
  const ids = sessions.map(() => nextId());
  logger.debug({ count: sessions.length, kind: input.kind }, 'formatting sessions');

  return sessions
    .map(({ session, feedback }, idx) => {
      const id = ids[idx];
      const feedbackBlock = feedback
        ? `\n\nFeedback for session ${id}:\n<FEEDBACK>\n${feedback}\n</FEEDBACK>`
        : '';
      return `<session_${id}>\n${getConversation(session)}${feedbackBlock}\n</session_${id}>`;
    })
    .join('\n\n');
}

export function generateSessionId(): string {
  return randomBytes(config.sessions.idBytes).toString('hex');
}
