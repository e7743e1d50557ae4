import { loadConfig } from '../config-loader.js';

export function describeConfig(configPath?: string): string[] {
  const config = loadConfig(configPath);
  return [
    'Configuration is valid!',
    '',
    'Settings:',
    `  Kubeconfig:       ${config.kubeconfig.path ?? '(default lookup)'}`,
    `  SQL dialect:      ${config.parser.dialect}`,
    `  Max attempts:     ${config.cluster.maxAttempts}`,
    `  Retry delay:      ${config.cluster.retryDelayMs}ms`,
    `  Output format:    ${config.output.format}`,
    `  Color:            ${config.output.color ? 'on' : 'off'}`,
    `  Log level:        ${config.logLevel}`,
  ];
}

export function validateCommand(configPath?: string): void {
  try {
    for (const line of describeConfig(configPath)) {
      console.log(line);
    }
  } catch (err) {
    console.error('Configuration validation failed!');
    if (err instanceof Error) {
      console.error(err.message);
    }
    process.exit(1);
  }
}
