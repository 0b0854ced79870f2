import { ConfigResolution, ConfigSourceName, writeStderr } from '@triad/core';

const LABEL_WIDTH = 14;
const NONE_LABEL = 'none (built-in defaults)';

interface SummaryRow {
  label: string;
  value: string;
  keyPath?: string;
}

/**
 * Builds the human-readable configuration summary lines. Each value is followed by the
 * source that supplied it. The credential is never shown, only whether it is set.
 *
 * @param resolution - Resolved configuration with per-key sources.
 * @param configFilePath - The config file that was read, if any.
 */
export function formatConfigSummary(resolution: ConfigResolution, configFilePath?: string): string[] {
  const { config, sources } = resolution;
  const rows: SummaryRow[] = [
    { label: 'Model', value: config.openai.model, keyPath: 'openai.model' },
    { label: 'API key', value: config.openai.apiKey ? 'set' : 'not set', keyPath: 'openai.api_key' },
    { label: 'Base URL', value: config.openai.baseUrl, keyPath: 'openai.base_url' },
    { label: 'Temperature', value: String(config.openai.temperature), keyPath: 'openai.temperature' },
    { label: 'Max tokens', value: String(config.openai.maxTokens), keyPath: 'openai.max_tokens' },
    { label: 'Turns', value: String(config.debate.maxTurns), keyPath: 'debate.max_turns' },
    { label: 'Topic', value: config.debate.topic, keyPath: 'debate.topic' },
    { label: 'Language', value: config.project.language, keyPath: 'project.language' },
    { label: 'Output dir', value: config.logging.output.enabled ? config.logging.output.directory : 'disabled', keyPath: 'logging.output.directory' },
    { label: 'Verbose', value: String(config.logging.console.verbose), keyPath: 'logging.console.verbose' },
    { label: 'Config file', value: configFilePath ?? NONE_LABEL },
  ];

  return [
    'Configuration:',
    ...rows.map((row) => {
      const source = row.keyPath ? sources.get(row.keyPath) : undefined;
      return `  ${`${row.label}:`.padEnd(LABEL_WIDTH)}${row.value}${formatSource(source)}`;
    }),
  ];
}

function formatSource(source: ConfigSourceName | undefined): string {
  return source ? ` (${source})` : '';
}

/**
 * Writes the configuration summary to stderr.
 */
export function printConfigSummary(resolution: ConfigResolution, configFilePath?: string): void {
  writeStderr(`${formatConfigSummary(resolution, configFilePath).join('\n')}\n`);
}
