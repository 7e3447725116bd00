import type { AnnotatedSession, Session } from '../types';

/** One conversation with no feedback attached. */
export interface SingleSessionInput {
  kind: 'session';
  messages: Session;
}

/** Several conversations, none annotated. */
export interface SessionListInput {
  kind: 'sessions';
  sessions: Session[];
}

/** One conversation plus reviewer feedback. */
export interface AnnotatedSessionInput {
  kind: 'annotated';
  session: Session;
  feedback: string;
}

/** Several conversations, each with (possibly empty) feedback. */
export interface AnnotatedSessionListInput {
  kind: 'annotated-list';
  sessions: AnnotatedSession[];
}

export type SessionsInput =
  | SingleSessionInput
  | SessionListInput
  | AnnotatedSessionInput
  | AnnotatedSessionListInput;

export interface FormatSessionsOptions {
  /** Produces the id used in `<session_{id}>` tags. Defaults to random hex. */
  idFactory?: () => string;
}
