import { z } from 'zod';
import { InvalidSessionsError, type SessionsIssue } from '../errors';
import { logger } from '../logger';
import { sessionSchema } from '../messages/schema';
import type { SessionsInput } from '../contracts/sessions';

const feedbackSchema = z.string().optional().default('');

const pairSchema = z
  .tuple([sessionSchema, feedbackSchema])
  .transform(([session, feedback]) => ({ session, feedback }));

const annotatedObjectSchema = z.object({
  messages: sessionSchema,
  feedback: feedbackSchema,
});

const annotatedSchema = z.union([
  pairSchema,
  annotatedObjectSchema.transform(({ messages, feedback }) => ({ session: messages, feedback })),
]);

// Order matters: a bare session is tried before the list forms, and an empty array is
// handled separately since it would match every array variant.
const variants: z.ZodType<SessionsInput, z.ZodTypeDef, unknown>[] = [
  sessionSchema.nonempty().transform((messages): SessionsInput => ({ kind: 'session', messages })),
  z.array(sessionSchema).nonempty().transform((sessions): SessionsInput => ({ kind: 'sessions', sessions })),
  annotatedSchema.transform(
    ({ session, feedback }): SessionsInput => ({ kind: 'annotated', session, feedback }),
  ),
  z.array(annotatedSchema).nonempty().transform((sessions): SessionsInput => ({ kind: 'annotated-list', sessions })),
];

/**
 * Tags an untyped sessions payload with its variant. Accepts a message array, an array of
 * message arrays, a `[messages, feedback]` tuple (or `{ messages, feedback }` object), or an
 * array of those.
 *
 * A payload that matches none of them is logged and treated as no sessions, so
 * `formatSessions` renders it as `''`.
 */
export function parseSessionsInput(raw: unknown): SessionsInput {
  const result = matchSessionsInput(raw);
  if (result.success) return result.data;
  logger.warn({ issues: result.issues }, 'unrecognized sessions payload, formatting as empty');
  return { kind: 'sessions', sessions: [] };
}

/**
 * Same shapes as `parseSessionsInput`, but rejects anything else.
 *
 * @throws InvalidSessionsError when the payload matches none of them.
 */
export function parseSessionsInputStrict(raw: unknown): SessionsInput {
  const result = matchSessionsInput(raw);
  if (result.success) return result.data;
  throw new InvalidSessionsError(result.issues);
}

type MatchResult =
  | { success: true; data: SessionsInput }
  | { success: false; issues: SessionsIssue[] };

function matchSessionsInput(raw: unknown): MatchResult {
  if (Array.isArray(raw) && raw.length === 0) {
    return { success: true, data: { kind: 'sessions', sessions: [] } };
  }

  const issues: SessionsIssue[] = [];
  for (const variant of variants) {
    const parsed = variant.safeParse(raw);
    if (parsed.success) return { success: true, data: parsed.data };
    issues.push(...parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })));
  }
  return { success: false, issues };
}
