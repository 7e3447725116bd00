import { ContextUnavailableError } from '../errors';
import type { RunnableConfig } from '../contracts/context';

let current: RunnableConfig | null = null;

/**
 * Installs the process-wide config that `NamespaceTemplate.resolve()` falls back to when
 * called without one. Stays in place until `clearRunnableConfig()` or another set.
 */
export function setRunnableConfig(config: RunnableConfig): void {
  current = config;
}

export function clearRunnableConfig(): void {
  current = null;
}

export function getRunnableConfig(): RunnableConfig {
  if (!current) throw new ContextUnavailableError();
  return current;
}

export function hasRunnableConfig(): boolean {
  return current !== null;
}

/**
 * Runs `fn` with `config` installed and restores whatever was there before, even when `fn` throws.
 * Synchronous only: the previous config is back in place as soon as `fn` returns.
 */
export function withRunnableConfig<T>(config: RunnableConfig, fn: () => T): T {
  const previous = current;
  current = config;
  try {
    return fn();
  } finally {
    current = previous;
  }
}
