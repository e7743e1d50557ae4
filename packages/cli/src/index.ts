#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@kubeql/shared';
import type { Config } from '@kubeql/shared';
import { applyOverrides, loadConfig } from './config-loader.js';
import { queryCommand, readQuery } from './commands/query.js';
import { planCommand } from './commands/plan.js';
import { contextsCommand } from './commands/contexts.js';
import { validateCommand } from './commands/validate.js';

interface GlobalOptions {
  config?: string;
  logLevel?: string;
  output?: string;
  color: boolean;
}

interface SourceOptions {
  file?: string;
}

const program = new Command();

program
  .name('kubeql')
  .description('Query Kubernetes resources across contexts and namespaces with SQL')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to config file')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)')
  .option('-o, --output <format>', 'Output format (table, json)')
  .option('--no-color', 'Disable colored output');

function resolveConfig(): Config {
  const options = program.opts<GlobalOptions>();
  const config = applyOverrides(loadConfig(options.config), {
    output: options.output,
    color: options.color === false ? false : undefined,
    logLevel: options.logLevel,
  });
  setLogLevel(config.logLevel);
  return config;
}

function fail(err: unknown): never {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
}

program
  .command('query', { isDefault: true })
  .description('Run a query, e.g. SELECT default FROM minikube WHERE pod.status.phase = \'Running\'')
  .argument('[sql]', 'Query text')
  .option('-f, --file <path>', 'Read the query from a file')
  .action(async (sql: string | undefined, options: SourceOptions) => {
    try {
      await queryCommand(readQuery(sql, options.file), resolveConfig());
    } catch (err) {
      fail(err);
    }
  });

program
  .command('plan')
  .description('Print the query plan without contacting any cluster')
  .argument('[sql]', 'Query text')
  .option('-f, --file <path>', 'Read the query from a file')
  .action((sql: string | undefined, options: SourceOptions) => {
    try {
      console.log(planCommand(readQuery(sql, options.file), resolveConfig()));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('contexts')
  .description('List the contexts of the kubeconfig')
  .action(() => {
    try {
      console.log(contextsCommand(resolveConfig()));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('validate')
  .description('Validate the configuration file')
  .action(() => {
    validateCommand(program.opts<GlobalOptions>().config);
  });

program.parseAsync().catch(fail);
