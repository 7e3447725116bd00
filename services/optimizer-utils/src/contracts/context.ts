/**
 * Per-invocation settings handed down by the orchestration layer.
 * Only `configurable` is read here; it supplies values for namespace placeholders
 * such as `{user_id}`.
 */
export interface RunnableConfig {
  configurable?: Record<string, unknown>;
  tags?: string[];
  metadata?: Record<string, unknown>;
}
