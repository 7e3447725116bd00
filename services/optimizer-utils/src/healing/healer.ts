import { randomUUID } from 'crypto';
import { MissingVariableError } from '../errors';
import { logger } from '../logger';
import { extractVariables, placeholder } from './variables';

/*
 * Brace grammar used by `escape`:
 *
 *   lone-open  := "{" not preceded by "{" and not followed by "{"
 *   lone-close := "}" not preceded by "}" and not followed by "}"
 *
 * Only lone braces are doubled. Any run of two or more identical braces (`{{`, `{{{`, ...)
 * is treated as already escaped and left as is.
 */
const LONE_OPEN = /(?<!\{)\{(?!\{)/g;
const LONE_CLOSE = /(?<!\})\}(?!\})/g;

// `<TO_OPTIMIZE>` with optional attributes, and its closing tag; may span lines
const TO_OPTIMIZE_TAGS = /<TO_OPTIMIZE.*?>|<\/TO_OPTIMIZE>/gs;

export interface VariableHealerOptions {
  /** When set, `assertAllRequired` (and so `pipe`) rejects text missing any variable. */
  allRequired?: boolean;
}

export interface VariableHealer {
  readonly variables: readonly string[];
  escape(input: string): string;
  mask(input: string): string;
  unmask(input: string): string;
  assertAllRequired(input: string): string;
  /** assert -> mask -> escape -> strip TO_OPTIMIZE tags -> unmask */
  pipe(input: string): string;
}

export function escapeBraces(input: string): string {
  return input.replace(LONE_OPEN, '{{').replace(LONE_CLOSE, '}}');
}

/**
 * Builds the functions that let optimizer output keep its `{name}` placeholders while every
 * other brace is escaped. `vars` is either the names themselves or a template to scan for them.
 * Mask tokens are fresh per healer.
 */
export function createVariableHealer(
  vars: Iterable<string> | string,
  options: VariableHealerOptions = {},
): VariableHealer {
  const variables = typeof vars === 'string' ? extractVariables(vars) : [...new Set(vars)];
  const allRequired = options.allRequired ?? false;

  if (variables.length === 0) {
    const identity = (input: string) => input;
    return {
      variables,
      escape: escapeBraces,
      mask: identity,
      unmask: identity,
      assertAllRequired: identity,
      pipe: escapeBraces,
    };
  }

  const varToToken = new Map<string, string>();
  const tokenToVar = new Map<string, string>();
  for (const name of variables) {
    const token = randomUUID().replace(/-/g, '');
    varToToken.set(placeholder(name), token);
    tokenToVar.set(token, placeholder(name));
  }

  const maskPattern = alternation([...varToToken.keys()]);
  const unmaskPattern = alternation([...tokenToVar.keys()]);

  const mask = (input: string) => input.replace(maskPattern, (m) => varToToken.get(m) ?? m);
  const unmask = (input: string) => input.replace(unmaskPattern, (m) => tokenToVar.get(m) ?? m);

  const assertAllRequired = (input: string) => {
    if (!allRequired) return input;
    const missing = variables.filter((name) => !input.includes(placeholder(name)));
    if (missing.length > 0) {
      logger.warn({ missing }, 'optimizer output dropped required variables');
      throw new MissingVariableError(missing);
    }
    return input;
  };

  const pipe = (input: string) =>
    unmask(escapeBraces(mask(assertAllRequired(input))).replace(TO_OPTIMIZE_TAGS, ''));

  logger.debug({ variables, allRequired }, 'variable healer ready');
  return { variables, escape: escapeBraces, mask, unmask, assertAllRequired, pipe };
}

// Longest alternatives first so a placeholder is never shadowed by one that is its prefix.
function alternation(literals: string[]): RegExp {
  const sorted = [...literals].sort((a, b) => b.length - a.length);
  return new RegExp(sorted.map(escapeRegExp).join('|'), 'g');
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
