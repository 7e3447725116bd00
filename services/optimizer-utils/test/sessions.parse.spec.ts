import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseSessionsInput, parseSessionsInputStrict } from '../src/sessions/parse';
import { formatSessions } from '../src/sessions/format';
import { InvalidSessionsError } from '../src/errors';
import { logger } from '../src/logger';
import type { Message } from '../src/types';

const a: Message = { role: 'user', content: 'hello' };
const b: Message = { role: 'assistant', content: 'hi!' };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseSessionsInput', () => {
  it('recognizes a bare session', () => {
    expect(parseSessionsInput([a, b])).toEqual({ kind: 'session', messages: [a, b] });
  });

  it('recognizes a list of sessions', () => {
    expect(parseSessionsInput([[a], [b]])).toEqual({ kind: 'sessions', sessions: [[a], [b]] });
  });

  it('recognizes a session/feedback pair as a tuple or an object', () => {
    expect(parseSessionsInput([[a, b], 'nice'])).toEqual({ kind: 'annotated', session: [a, b], feedback: 'nice' });
    expect(parseSessionsInput({ messages: [a] })).toEqual({ kind: 'annotated', session: [a], feedback: '' });
  });

  it('recognizes a list of pairs', () => {
    expect(parseSessionsInput([[[a], 'first'], { messages: [b], feedback: 'second' }])).toEqual({
      kind: 'annotated-list',
      sessions: [
        { session: [a], feedback: 'first' },
        { session: [b], feedback: 'second' },
      ],
    });
  });

  it('maps an empty array to an empty session list', () => {
    const parsed = parseSessionsInput([]);
    expect(parsed).toEqual({ kind: 'sessions', sessions: [] });
    expect(formatSessions(parsed)).toBe('');
  });

  it('formats malformed payloads as empty and logs a warning', () => {
    const warn = vi.spyOn(logger, 'warn');

    expect(formatSessions(parseSessionsInput([{ role: 'narrator', content: 'x' }]))).toBe('');
    expect(formatSessions(parseSessionsInput(null))).toBe('');
    expect(parseSessionsInput('just text')).toEqual({ kind: 'sessions', sessions: [] });

    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith(
      { issues: expect.any(Array) },
      'unrecognized sessions payload, formatting as empty',
    );
  });
});

describe('parseSessionsInputStrict', () => {
  it('accepts the same shapes', () => {
    expect(parseSessionsInputStrict([[a], 'ok'])).toEqual({ kind: 'annotated', session: [a], feedback: 'ok' });
    expect(parseSessionsInputStrict([])).toEqual({ kind: 'sessions', sessions: [] });
  });

  it('rejects payloads that match no shape', () => {
    expect(() => parseSessionsInputStrict('just text')).toThrow(InvalidSessionsError);
    expect(() => parseSessionsInputStrict([{ role: 'narrator', content: 'x' }])).toThrow(InvalidSessionsError);

    try {
      parseSessionsInputStrict(42);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidSessionsError);
      if (!(err instanceof InvalidSessionsError)) return;
      expect(err.code).toBe('invalid_sessions');
      expect(err.issues.length).toBeGreaterThan(0);
    }
  });
});
