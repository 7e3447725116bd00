import type { SessionsInput } from '../contracts/sessions';
import type { AnnotatedSession } from '../types';

/** Brings every accepted input shape down to `(session, feedback)` pairs, preserving order. */
export function normalizeSessions(input: SessionsInput): AnnotatedSession[] {
  switch (input.kind) {
    case 'session':
      return input.messages.length > 0 ? [{ session: input.messages, feedback: '' }] : [];
    case 'sessions':
      return input.sessions.map((session) => ({ session, feedback: '' }));
    case 'annotated':
      return [{ session: input.session, feedback: input.feedback }];
    case 'annotated-list':
      return input.sessions.map(({ session, feedback }) => ({ session, feedback }));
  }
}
