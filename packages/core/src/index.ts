// Session orchestration
export { runSession, speakerForTurn } from './core/scheduler';
export type { SessionHooks, SessionParams } from './core/scheduler';
export {
  TranscriptWriter, SECTION_BREAK, transcriptFileName, renderHeader, renderTurnBlock, sealTranscriptText,
} from './core/transcript-writer';
export type { TranscriptHandle, TranscriptSink, TranscriptWriterOptions } from './core/transcript-writer';

// Configuration
export {
  resolveConfig, resolveConfigDetailed, builtInDefaults, getByPath, toEnvVarName, coerceEnvValue,
  cliSource, envSource, fileSource, defaultSource, createSourceChain, lookupValue, CLI_OPTION_KEYS,
} from './config/config-resolver';
export type { ConfigSource, ConfigResolution, ResolvedValue } from './config/config-resolver';
export { loadConfigFile, parseConfigText, DEFAULT_CONFIG_CANDIDATES } from './config/config-file';
export type { LoadedConfigFile } from './config/config-file';

// Agents
export { buildRoster, createRole, formatParticipants, ROSTER_ORDER } from './agents/roles';
export { createGenerator, buildChatMessages, buildInstructions, isFinalTurn } from './agents/generator';
export type { AgentLogger } from './agents/agent-logger';
export {
  buildSystemMessage, buildOpeningMessage, buildProjectSection,
  LANGUAGE_INSTRUCTIONS, MEDIATOR_CLOSING_INSTRUCTIONS,
} from './agents/prompts/debate-prompts';

// Providers
export { createProvider } from './providers/provider-factory';
export { CHAT_ROLES } from './providers/llm-provider';
export type { LLMProvider, CompletionResponse, CompletionUsage, CompletionRequest, ChatMessage, ChatRole } from './providers/llm-provider';
export { OpenAIProvider } from './providers/openai-provider';

// Types - re-export all
export * from './types/config.types';
export * from './types/debate.types';

// Errors
export {
  TriadError, ConfigurationError, GenerationFailure, ProviderConnectionError, TranscriptWriteError, MalformedTranscriptError,
} from './utils/errors';
export { EXIT_GENERAL_ERROR } from './utils/exit-codes';

// Utilities
export { loadEnvironmentFile } from './utils/env-loader';
export { getErrorMessage, getErrorCode, isPlainObject, deepFreeze, ensureDirectory } from './utils/common';
export { formatLocalTime, formatFileTimestamp, formatDuration } from './utils/time-format';
export { logInfo, logSuccess, logWarning, logError, writeStderr, formatMessage, MessageType, MESSAGE_ICONS } from './utils/console';
export { Logger } from './utils/logger';
