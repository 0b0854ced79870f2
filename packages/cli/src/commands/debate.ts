import { Command } from 'commander';
import {
  AgentLogger,
  CliArgs,
  EffectiveConfig,
  EXIT_GENERAL_ERROR,
  GenerationFailure,
  Logger,
  TranscriptWriter,
  buildRoster,
  createGenerator,
  createProvider,
  getErrorCode,
  getErrorMessage,
  loadConfigFile,
  loadEnvironmentFile,
  logError,
  resolveConfigDetailed,
  runSession,
} from '@triad/core';

import { printConfigSummary } from '../utils/config-summary';
import { DebateProgressUI } from '../utils/progress-ui';

export interface DebateCommandOptions {
  apiKey?: string;
  model?: string;
  turns?: string;
  temperature?: string;
  maxTokens?: string;
  language?: string;
  outputDir?: string;
  config?: string;
  envFile?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

/**
 * Parses a numeric option. Text that is not a number is passed on as NaN so that
 * configuration validation reports it together with every other violation.
 */
function parseNumberOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Maps the positional topic and the parsed command options onto CLI configuration
 * values. Options that were not given stay undefined so lower-precedence sources apply.
 */
export function toCliArgs(topic: string | undefined, options: DebateCommandOptions): CliArgs {
  return {
    topic,
    apiKey: options.apiKey,
    model: options.model,
    turns: parseNumberOption(options.turns),
    temperature: parseNumberOption(options.temperature),
    maxTokens: parseNumberOption(options.maxTokens),
    language: options.language,
    outputDir: options.outputDir,
    verbose: options.verbose,
  };
}

/**
 * Creates an agent logger. Verbose-only lines go through the logger's debug level so
 * they still appear when the progress display is turned off; the rest go to the
 * progress UI.
 *
 * @param progressUI - The progress UI instance used for regular messages.
 * @param logger - The logger that gates verbose messages.
 */
function createAgentLogger(progressUI: DebateProgressUI, logger: Logger): AgentLogger {
  return (message: string, onlyVerbose?: boolean): void => {
    if (onlyVerbose) {
      logger.debug(message);
    } else {
      progressUI.log(message);
    }
  };
}

function createTranscriptWriter(config: EffectiveConfig): TranscriptWriter | undefined {
  const output = config.logging.output;
  if (!output.enabled) return undefined;
  return new TranscriptWriter({
    directory: output.directory,
    filenamePrefix: output.filenamePrefix,
    showTimestamps: output.showTimestamps,
  });
}

async function runDebate(config: EffectiveConfig, logger: Logger): Promise<void> {
  const provider = createProvider(config.openai);
  const modelCount = await provider.checkConnection();
  logger.info(`Connected to ${config.openai.baseUrl} (${modelCount} models available)`);

  const progressUI = new DebateProgressUI(config.logging.console.showProgress);
  const generate = createGenerator(provider, config.openai, createAgentLogger(progressUI, logger));
  const roster = buildRoster(config);
  const writer = createTranscriptWriter(config);

  try {
    const transcript = await runSession({
      config,
      roster,
      topic: config.debate.topic,
      generate,
      writer,
      hooks: progressUI.createHooks(),
    });
    if (transcript.filePath) {
      logger.success(`Saved transcript to ${transcript.filePath}`);
      process.stdout.write(`${transcript.filePath}\n`);
    }
  } catch (error: unknown) {
    if (error instanceof GenerationFailure && error.transcript.filePath) {
      logger.warn(`Partial transcript saved to ${error.transcript.filePath}`);
    }
    throw error;
  }
}

/**
 * Registers the debate as the root action of the program:
 * `triad [topic] [options]`.
 */
export function debateCommand(program: Command): void {
  program
    .argument('[topic]', 'Debate topic (default: debate.topic from the configuration)')
    .option('--api-key <key>', 'OpenAI API key (default: OPENAI_API_KEY)')
    .option('--model <name>', 'Model name')
    .option('-t, --turns <number>', 'Number of turns')
    .option('--temperature <number>', 'Sampling temperature (0.0 - 2.0)')
    .option('--max-tokens <number>', 'Maximum tokens per reply')
    .option('--language <code>', 'Output language (ja, en, zh)')
    .option('-o, --output-dir <path>', 'Directory for transcript files')
    .option('-c, --config <path>', 'Path to a YAML configuration file (default: ./config.yml)')
    .option('-e, --env-file <path>', 'Path to environment file (default: .env)')
    .option('-v, --verbose', 'Verbose output')
    .option('--dry-run', 'Resolve and validate the configuration, print it, and exit')
    .action(async (topic: string | undefined, options: DebateCommandOptions): Promise<void> => {
      try {
        loadEnvironmentFile(options.envFile, options.verbose);

        const configFile = await loadConfigFile(options.config);
        const resolution = resolveConfigDetailed(toCliArgs(topic, options), configFile.data, process.env);
        const config = resolution.config;
        const logger = new Logger(config.logging.console.verbose);
        if (!configFile.path) {
          logger.debug('No config file found; using built-in defaults');
        }

        if (options.dryRun || logger.isVerbose) {
          printConfigSummary(resolution, configFile.path);
        }
        if (options.dryRun) {
          logger.success('Configuration is valid (dry run)');
          return;
        }

        await runDebate(config, logger);
      } catch (err: unknown) {
        const code = getErrorCode(err) ?? EXIT_GENERAL_ERROR;
        const message = getErrorMessage(err);
        logError(message);
        // Rethrow for runCli catch to set process exit when direct run
        throw Object.assign(new Error(message, { cause: err }), { code });
      }
    });
}
