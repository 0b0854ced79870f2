import {
  AGENT_KEYS, AgentKey, AgentProfile, CliArgs, CONFIG_SOURCES, ConfigSourceName, EffectiveConfig,
  MAX_TOKENS_RANGE, MAX_TURNS_RANGE, OUTPUT_FORMATS, ProjectValue, SPEAKER_SELECTION, SUPPORTED_LANGUAGES,
  SUPPORTED_MODELS, TEMPERATURE_RANGE,
} from '../types/config.types';
import { CONVENER_NAME } from '../types/debate.types';
import { deepFreeze, isPlainObject } from '../utils/common';
import { ConfigurationError } from '../utils/errors';

const DEFAULT_MODEL = 'gpt-4';
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_MAX_TURNS = 9; // three full rounds of the three-role roster
const DEFAULT_TOPIC = 'Plan A: expand nuclear power vs Plan B: concentrate on renewable energy';
const DEFAULT_PROJECT_NAME = 'Untitled project';
const DEFAULT_LANGUAGE = 'en';
const DEFAULT_OUTPUT_DIRECTORY = '.';
const DEFAULT_FILENAME_PREFIX = 'debate';

const TRUE_TOKENS = ['true', 'yes', 'on', '1'];
const FALSE_TOKENS = ['false', 'no', 'off', '0'];
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const KEY_API_KEY = 'openai.api_key';
const KEY_PATH_SEPARATOR = '.';

/**
 * Dotted config key each CLI option feeds. This is the only place CLI names are tied
 * to configuration keys.
 */
export const CLI_OPTION_KEYS: ReadonlyArray<readonly [keyof CliArgs, string]> = [
  ['topic', 'debate.topic'],
  ['apiKey', KEY_API_KEY],
  ['model', 'openai.model'],
  ['turns', 'debate.max_turns'],
  ['temperature', 'openai.temperature'],
  ['maxTokens', 'openai.max_tokens'],
  ['language', 'project.language'],
  ['outputDir', 'logging.output.directory'],
  ['verbose', 'logging.console.verbose'],
];

/**
 * A single place a configuration value may come from.
 * `lookup` returns undefined when the source has nothing for the key.
 */
export interface ConfigSource {
  name: ConfigSourceName;
  lookup(keyPath: string): unknown;
}

export interface ResolvedValue {
  value: unknown;
  source: ConfigSourceName;
}

export interface ConfigResolution {
  config: EffectiveConfig;
  /** Source that supplied each resolved key, in resolution order. */
  sources: ReadonlyMap<string, ConfigSourceName>;
}

/**
 * Returns the built-in defaults in the same nested shape as the YAML config file.
 * The credential has no default.
 */
export function builtInDefaults(): Record<string, unknown> {
  return {
    openai: {
      model: DEFAULT_MODEL,
      temperature: DEFAULT_TEMPERATURE,
      max_tokens: DEFAULT_MAX_TOKENS,
      base_url: DEFAULT_BASE_URL,
    },
    debate: {
      topic: DEFAULT_TOPIC,
      max_turns: DEFAULT_MAX_TURNS,
      speaker_selection: SPEAKER_SELECTION.ROUND_ROBIN,
      agents: {
        pro: { name: 'Pro', stance: 'Supports Plan A' },
        con: { name: 'Con', stance: 'Supports Plan B' },
        mediator: { name: 'Mediator', stance: 'Mediator' },
      },
    },
    project: {
      name: DEFAULT_PROJECT_NAME,
      language: DEFAULT_LANGUAGE,
      constraints: {},
      conditions: {},
    },
    logging: {
      output: {
        enabled: true,
        directory: DEFAULT_OUTPUT_DIRECTORY,
        filename_prefix: DEFAULT_FILENAME_PREFIX,
        format: OUTPUT_FORMATS.MARKDOWN,
        show_timestamps: true,
      },
      console: {
        verbose: false,
        show_progress: true,
      },
    },
  };
}

/**
 * Walks a nested object along a dotted key path.
 *
 * @param data - Root object (e.g. a parsed YAML document).
 * @param keyPath - Dotted path such as "logging.output.directory".
 * @returns The value at the path, or undefined when any segment is missing.
 */
export function getByPath(data: unknown, keyPath: string): unknown {
  let current: unknown = data;
  for (const segment of keyPath.split(KEY_PATH_SEPARATOR)) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Maps a dotted key to its environment variable name: "openai.api_key" → "OPENAI_API_KEY".
 */
export function toEnvVarName(keyPath: string): string {
  return keyPath.toUpperCase().replace(/[.-]/g, '_');
}

/**
 * Converts an environment variable's text into a typed value.
 * Boolean tokens are checked before numbers, so "1" and "0" become booleans.
 * Integers that do not fit a safe integer stay text.
 */
export function coerceEnvValue(raw: string): ProjectValue {
  const lowered = raw.trim().toLowerCase();
  if (TRUE_TOKENS.includes(lowered)) return true;
  if (FALSE_TOKENS.includes(lowered)) return false;

  const trimmed = raw.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    const parsed = parseInt(trimmed, 10);
    return Number.isSafeInteger(parsed) ? parsed : raw;
  }
  if (FLOAT_PATTERN.test(trimmed)) return parseFloat(trimmed);
  return raw;
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

export function cliSource(cliArgs: CliArgs): ConfigSource {
  const optionByKey = new Map<string, keyof CliArgs>(CLI_OPTION_KEYS.map(([option, keyPath]) => [keyPath, option]));
  return {
    name: CONFIG_SOURCES.CLI,
    lookup: (keyPath) => {
      const option = optionByKey.get(keyPath);
      return option === undefined ? undefined : cliArgs[option];
    },
  };
}

export function envSource(env: NodeJS.ProcessEnv): ConfigSource {
  return {
    name: CONFIG_SOURCES.ENV,
    lookup: (keyPath) => {
      const raw = env[toEnvVarName(keyPath)];
      return raw === undefined ? undefined : coerceEnvValue(raw);
    },
  };
}

export function fileSource(fileConfig: Record<string, unknown>): ConfigSource {
  return { name: CONFIG_SOURCES.FILE, lookup: (keyPath) => getByPath(fileConfig, keyPath) };
}

export function defaultSource(defaults: Record<string, unknown> = builtInDefaults()): ConfigSource {
  return { name: CONFIG_SOURCES.DEFAULT, lookup: (keyPath) => getByPath(defaults, keyPath) };
}

/**
 * Builds the precedence chain: CLI, then environment, then file, then defaults.
 */
export function createSourceChain(cliArgs: CliArgs, fileConfig: Record<string, unknown>, envVars: NodeJS.ProcessEnv): ConfigSource[] {
  return [cliSource(cliArgs), envSource(envVars), fileSource(fileConfig), defaultSource()];
}

/**
 * Evaluates the sources in order and returns the first non-absent value.
 *
 * @returns The value and the name of the source that supplied it, or undefined.
 */
export function lookupValue(sources: readonly ConfigSource[], keyPath: string): ResolvedValue | undefined {
  for (const source of sources) {
    const value = source.lookup(keyPath);
    if (!isAbsent(value)) {
      return { value, source: source.name };
    }
  }
  return undefined;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (isPlainObject(value) || Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

function isScalar(value: unknown): value is ProjectValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Reads typed fields through the source chain, recording every violation instead of
 * stopping at the first one. Placeholder values returned for invalid fields never
 * leave the resolver, because any violation aborts resolution.
 */
class FieldReader {
  readonly violations: string[] = [];
  readonly sources = new Map<string, ConfigSourceName>();

  constructor(private readonly chain: readonly ConfigSource[]) {}

  private resolve(keyPath: string): unknown {
    const resolved = lookupValue(this.chain, keyPath);
    if (!resolved) return undefined;
    this.sources.set(keyPath, resolved.source);
    return resolved.value;
  }

  string(keyPath: string): string {
    const value = this.resolve(keyPath);
    if (isAbsent(value)) {
      this.violations.push(`${keyPath} is not set`);
      return '';
    }
    if (!isScalar(value)) {
      this.violations.push(`${keyPath} must be a string (got ${describeValue(value)})`);
      return '';
    }
    return String(value);
  }

  credential(keyPath: string): string {
    const value = this.resolve(keyPath);
    if (isAbsent(value) || (typeof value === 'string' && value.trim() === '')) {
      this.violations.push(
        `${keyPath} is not set (use --api-key, the ${toEnvVarName(keyPath)} environment variable, or ${keyPath} in the config file)`
      );
      return '';
    }
    if (!isScalar(value)) {
      this.violations.push(`${keyPath} must be a string`);
      return '';
    }
    return String(value);
  }

  boolean(keyPath: string): boolean {
    const value = this.resolve(keyPath);
    if (typeof value !== 'boolean') {
      this.violations.push(`${keyPath} must be a boolean (got ${describeValue(value)})`);
      return false;
    }
    return value;
  }

  number(keyPath: string, range: { min: number; max: number }): number {
    const value = this.resolve(keyPath);
    if (typeof value !== 'number' || !Number.isFinite(value) || value < range.min || value > range.max) {
      this.violations.push(`${keyPath} must be a number between ${range.min} and ${range.max} (got ${describeValue(value)})`);
      return range.min;
    }
    return value;
  }

  integer(keyPath: string, range: { min: number; max: number }): number {
    const value = this.resolve(keyPath);
    if (typeof value !== 'number' || !Number.isInteger(value) || value < range.min || value > range.max) {
      this.violations.push(`${keyPath} must be an integer between ${range.min} and ${range.max} (got ${describeValue(value)})`);
      return range.min;
    }
    return value;
  }

  oneOf<T extends string>(keyPath: string, allowed: readonly [T, ...T[]]): T {
    const value = this.resolve(keyPath);
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      this.violations.push(`${keyPath} must be one of ${allowed.join(', ')} (got ${describeValue(value)})`);
      return allowed[0];
    }
    return match;
  }

  /**
   * Resolves a free-form map. Its keys come from every source that holds an object at
   * `keyPath`; each entry is then resolved individually so an environment variable can
   * override a single file entry.
   */
  scalarMap(keyPath: string): Record<string, ProjectValue> {
    const keys = new Set<string>();
    for (const source of this.chain) {
      const container = source.lookup(keyPath);
      if (isAbsent(container)) continue;
      if (!isPlainObject(container)) {
        this.violations.push(`${keyPath} must be a mapping (got ${describeValue(container)})`);
        continue;
      }
      Object.keys(container).forEach((key) => keys.add(key));
    }

    const result: Record<string, ProjectValue> = {};
    for (const key of keys) {
      const entryPath = `${keyPath}${KEY_PATH_SEPARATOR}${key}`;
      const value = this.resolve(entryPath);
      if (isAbsent(value)) continue;
      if (!isScalar(value)) {
        this.violations.push(`${entryPath} must be a string, number or boolean (got ${describeValue(value)})`);
        continue;
      }
      result[key] = value;
    }
    return result;
  }
}

function readAgentProfiles(reader: FieldReader): Record<AgentKey, AgentProfile> {
  const profile = (key: AgentKey): AgentProfile => ({
    name: reader.string(`debate.agents.${key}.name`),
    stance: reader.string(`debate.agents.${key}.stance`),
  });
  const agents = { pro: profile('pro'), con: profile('con'), mediator: profile('mediator') };
  checkAgentNames(agents, reader.violations);
  return agents;
}

/**
 * Agent names label every message in the log, so they must be distinct from each
 * other and from the convener.
 */
function checkAgentNames(agents: Record<AgentKey, AgentProfile>, violations: string[]): void {
  const seen = new Map<string, AgentKey>();
  for (const key of AGENT_KEYS) {
    const name = agents[key].name;
    if (name === '') continue;
    if (name === CONVENER_NAME) {
      violations.push(`debate.agents.${key}.name must not be "${CONVENER_NAME}", which labels the opening message`);
      continue;
    }
    const earlier = seen.get(name);
    if (earlier !== undefined) {
      violations.push(`debate.agents.${key}.name must differ from debate.agents.${earlier}.name (both "${name}")`);
      continue;
    }
    seen.set(name, key);
  }
}

/**
 * Merges CLI options, environment variables and the parsed config file over the
 * built-in defaults, then validates the result.
 *
 * @param cliArgs - Options the user passed explicitly; undefined entries are ignored.
 * @param fileConfig - Parsed YAML document, or an empty object when no file was used.
 * @param envVars - Environment variables (normally `process.env`).
 * @returns The frozen effective configuration and the source of every key.
 * @throws {ConfigurationError} Listing every violated constraint.
 */
export function resolveConfigDetailed(cliArgs: CliArgs, fileConfig: Record<string, unknown>, envVars: NodeJS.ProcessEnv): ConfigResolution {
  const reader = new FieldReader(createSourceChain(cliArgs, fileConfig, envVars));

  const config: EffectiveConfig = {
    openai: {
      apiKey: reader.credential(KEY_API_KEY),
      model: reader.oneOf('openai.model', SUPPORTED_MODELS),
      temperature: reader.number('openai.temperature', TEMPERATURE_RANGE),
      maxTokens: reader.integer('openai.max_tokens', MAX_TOKENS_RANGE),
      baseUrl: reader.string('openai.base_url'),
    },
    debate: {
      topic: reader.string('debate.topic'),
      maxTurns: reader.integer('debate.max_turns', MAX_TURNS_RANGE),
      speakerSelection: reader.oneOf('debate.speaker_selection', [SPEAKER_SELECTION.ROUND_ROBIN]),
      agents: readAgentProfiles(reader),
    },
    project: {
      name: reader.string('project.name'),
      language: reader.oneOf('project.language', SUPPORTED_LANGUAGES),
      constraints: reader.scalarMap('project.constraints'),
      conditions: reader.scalarMap('project.conditions'),
    },
    logging: {
      output: {
        enabled: reader.boolean('logging.output.enabled'),
        directory: reader.string('logging.output.directory'),
        filenamePrefix: reader.string('logging.output.filename_prefix'),
        format: reader.oneOf('logging.output.format', [OUTPUT_FORMATS.MARKDOWN]),
        showTimestamps: reader.boolean('logging.output.show_timestamps'),
      },
      console: {
        verbose: reader.boolean('logging.console.verbose'),
        showProgress: reader.boolean('logging.console.show_progress'),
      },
    },
  };

  if (reader.violations.length > 0) {
    throw new ConfigurationError(reader.violations);
  }

  return { config: deepFreeze(config), sources: reader.sources };
}

/**
 * Resolves the effective configuration. See {@link resolveConfigDetailed}.
 */
export function resolveConfig(cliArgs: CliArgs, fileConfig: Record<string, unknown>, envVars: NodeJS.ProcessEnv): EffectiveConfig {
  return resolveConfigDetailed(cliArgs, fileConfig, envVars).config;
}
