import { getRunnableConfig } from '../context/runnableConfig';
import type { RunnableConfig } from '../contracts/context';
import type { Namespace, NamespaceSegment } from '../types';

// a whole segment of the form `{name}`; the name itself may not contain braces
const PLACEHOLDER_SEGMENT = /^\{([^{}]+)\}$/;

/**
 * A namespace such as `['memories', '{user_id}', 'facts']` whose placeholder segments are
 * filled from `config.configurable` at call time.
 *
 * Substitution rules for a placeholder's `configurable` value:
 * - string: used as-is
 * - number, boolean, bigint: converted with `String()`
 * - missing, `null`, `undefined`, or any other value (objects, arrays, functions, symbols):
 *   the `{name}` segment is kept verbatim
 */
export class NamespaceTemplate {
  readonly segments: Namespace;
  readonly variables: ReadonlyMap<number, string>;

  constructor(segments: readonly NamespaceSegment[]) {
    this.segments = Object.freeze([...segments]);
    const variables = new Map<number, string>();
    this.segments.forEach((segment, idx) => {
      const key = placeholderName(segment);
      if (key !== null) variables.set(idx, key);
    });
    this.variables = variables;
  }

  /**
   * Substitutes each placeholder with its `configurable` value. Placeholders without a value are
   * returned verbatim. Falls back to the ambient config when `config` is omitted.
   *
   * @throws ContextUnavailableError when no config is passed and none has been set.
   */
  resolve(config?: RunnableConfig): NamespaceSegment[] {
    const effective = config ?? getRunnableConfig();
    if (this.variables.size === 0) return [...this.segments];

    const configurable = effective.configurable ?? {};
    return this.segments.map((segment, idx) => {
      const key = this.variables.get(idx);
      if (key === undefined) return segment;
      if (!Object.prototype.hasOwnProperty.call(configurable, key)) return segment;
      const value = configurable[key];
      return segmentValue(value) ?? segment;
    });
  }
}

function segmentValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

export function placeholderName(segment: NamespaceSegment): string | null {
  const match = PLACEHOLDER_SEGMENT.exec(segment);
  return match ? match[1] : null;
}
