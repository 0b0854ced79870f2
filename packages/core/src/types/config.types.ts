/** Supported model identifiers. */
export const SUPPORTED_MODELS = ['gpt-4', 'gpt-3.5-turbo', 'gpt-4-turbo', 'gpt-4o', 'gpt-5'] as const;

/** Supported debate languages. */
export const SUPPORTED_LANGUAGES = ['ja', 'en', 'zh'] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

/** String literal constants for speaker selection policies */
export const SPEAKER_SELECTION = {
  ROUND_ROBIN: 'round_robin',
} as const;

export type SpeakerSelection = (typeof SPEAKER_SELECTION)[keyof typeof SPEAKER_SELECTION];

/** String literal constants for transcript output formats */
export const OUTPUT_FORMATS = {
  MARKDOWN: 'markdown',
} as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[keyof typeof OUTPUT_FORMATS];

/** Keys of the three debate participants in the `debate.agents` group. */
export const AGENT_KEYS = ['pro', 'con', 'mediator'] as const;
export type AgentKey = (typeof AGENT_KEYS)[number];

export const TEMPERATURE_RANGE = { min: 0.0, max: 2.0 } as const;
export const MAX_TURNS_RANGE = { min: 1, max: 100 } as const;
export const MAX_TOKENS_RANGE = { min: 1, max: 32000 } as const;

/** Scalar values allowed in the free-form project constraint and condition maps. */
export type ProjectValue = string | number | boolean;

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** OpenAI-compatible endpoint; point it at a local server to debate offline. */
  baseUrl: string;
}

export interface AgentProfile {
  /** Display name used in the transcript and as the chat speaker label. */
  name: string;
  /** Short label shown in the participant legend. */
  stance: string;
}

export interface DebateSettings {
  topic: string;
  /** Absolute ceiling on individual speaker turns, not full cycles. */
  maxTurns: number;
  speakerSelection: SpeakerSelection;
  agents: Record<AgentKey, AgentProfile>;
}

export interface ProjectSettings {
  name: string;
  language: Language;
  constraints: Record<string, ProjectValue>;
  conditions: Record<string, ProjectValue>;
}

export interface OutputSettings {
  enabled: boolean;
  directory: string;
  filenamePrefix: string;
  format: OutputFormat;
  showTimestamps: boolean;
}

export interface ConsoleSettings {
  verbose: boolean;
  showProgress: boolean;
}

export interface LoggingSettings {
  output: OutputSettings;
  console: ConsoleSettings;
}

/**
 * Fully merged and validated configuration for one session.
 * Every field carries a value; the resolver freezes the whole tree.
 */
export interface EffectiveConfig {
  openai: OpenAIConfig;
  debate: DebateSettings;
  project: ProjectSettings;
  logging: LoggingSettings;
}

/**
 * Options the CLI can supply. Absent (undefined) entries fall through to the
 * environment, the config file and the built-in defaults.
 */
export interface CliArgs {
  topic?: string;
  apiKey?: string;
  model?: string;
  turns?: number;
  temperature?: number;
  maxTokens?: number;
  language?: string;
  outputDir?: string;
  verbose?: boolean;
}

/** Name of the source that supplied a configuration value. */
export const CONFIG_SOURCES = {
  CLI: 'cli',
  ENV: 'env',
  FILE: 'file',
  DEFAULT: 'default',
} as const;

export type ConfigSourceName = (typeof CONFIG_SOURCES)[keyof typeof CONFIG_SOURCES];
