export { NamespaceTemplate, placeholderName } from './namespace/template';
export {
  clearRunnableConfig,
  getRunnableConfig,
  hasRunnableConfig,
  setRunnableConfig,
  withRunnableConfig,
} from './context/runnableConfig';
export { formatSessions, generateSessionId } from './sessions/format';
export { normalizeSessions } from './sessions/normalize';
export { parseSessionsInput, parseSessionsInputStrict } from './sessions/parse';
export { mergeMessageRuns } from './messages/merge';
export { getConversation, prettyRepr, titleRepr } from './messages/pretty';
export { messageSchema, sessionSchema } from './messages/schema';
export { createVariableHealer, escapeBraces } from './healing/healer';
export { extractVariables } from './healing/variables';
export { buildPromptSchema, describePromptVariables } from './schema/promptSchema';
export {
  ContextUnavailableError,
  InvalidSessionsError,
  MissingVariableError,
  OptimizerError,
} from './errors';
export { logger } from './logger';

export type { RunnableConfig } from './contracts/context';
export type {
  AnnotatedSessionInput,
  AnnotatedSessionListInput,
  FormatSessionsOptions,
  SessionListInput,
  SessionsInput,
  SingleSessionInput,
} from './contracts/sessions';
export type { VariableHealer, VariableHealerOptions } from './healing/healer';
export type { OptimizedPromptOutput, PromptSchema } from './schema/promptSchema';
export type { OptimizerErrorCode, SessionsIssue } from './errors';
export type { AnnotatedSession, Message, MessageRole, Namespace, NamespaceSegment, Session } from './types';
