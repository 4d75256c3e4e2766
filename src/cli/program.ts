/**
 * cloudsigma-inventory CLI
 *
 * User-facing output (inventory documents, tables, error lines) is written
 * through the `CliIO` writers; diagnostics go through the pino logger on
 * stderr.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { stringify as stringifyYaml } from 'yaml';
import { CloudSigmaInventoryPlugin } from '../cloudsigma-inventory.plugin.js';
import { InventoryData } from '../inventory/inventory-data.class.js';
import { listRegions } from '../regions.js';
import { BaseError, ConfigurationError, InventoryDataError } from '../errors.js';
import { createLogger, getLoggerOptionsFromEnv, type Logger } from '../concerns/logger.js';
import type { CloudSigmaApiFactory } from '../inventory-sync.class.js';
import type { ConfigEnvironment } from '../config/inventory-config.class.js';
import type { CliOptions } from '../types/cli.types.js';

export const VERSION = '1.0.0';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Show the progress spinner; only on a terminal. */
  interactive?: boolean;
  env?: ConfigEnvironment;
  createClient?: CloudSigmaApiFactory;
  logger?: Logger;
}

export const defaultIO: CliIO = {
  stdout: text => { process.stdout.write(text); },
  stderr: text => { process.stderr.write(text); },
  interactive: Boolean(process.stderr.isTTY),
};

function selectedModes(options: CliOptions): string[] {
  const modes: string[] = [];
  if (options.list) modes.push('--list');
  if (options.host !== undefined) modes.push('--host');
  if (options.graph !== undefined) modes.push('--graph');
  return modes;
}

function render(value: unknown, yaml: boolean): string {
  return yaml ? stringifyYaml(value) : `${JSON.stringify(value, null, 2)}\n`;
}

async function runInventory(options: CliOptions, io: CliIO): Promise<void> {
  const source = options.inventory;
  if (!source) {
    throw new ConfigurationError('No inventory source given', {
      field: 'inventory',
      suggestion: 'Pass the source file with -i, e.g. -i inventory.cloudsigma.yml',
    });
  }

  const modes = selectedModes(options);
  if (modes.length !== 1) {
    throw new ConfigurationError(
      modes.length === 0 ? 'No action given' : `Conflicting actions: ${modes.join(', ')}`,
      { suggestion: 'Use exactly one of --list, --host <name> or --graph [group].' }
    );
  }

  const logger = io.logger ?? createLogger(getLoggerOptionsFromEnv({
    level: options.verbose ? 'debug' : 'warn',
    name: 'cloudsigma-inventory',
  }));

  const plugin = new CloudSigmaInventoryPlugin({
    createClient: io.createClient,
    env: io.env,
    logger,
  });

  if (!(await plugin.verifyFile(source))) {
    throw new ConfigurationError(`${source} is not a readable CloudSigma inventory source`, {
      path: source,
      suggestion: 'The file name must end in cloudsigma.yml or cloudsigma.yaml.',
    });
  }

  const spinner = ora({
    text: 'Fetching CloudSigma inventory...',
    stream: process.stderr,
    isSilent: !io.interactive,
  }).start();

  const inventory = new InventoryData();
  try {
    const result = await plugin.parse(inventory, source, { cache: !options.flushCache });
    spinner.succeed(`${result.hostsAdded.length} hosts from ${result.region}${result.fromCache ? ' (cached)' : ''}`);
  } catch (err) {
    spinner.fail('Inventory failed');
    throw err;
  }

  if (options.list) {
    io.stdout(render(inventory.toListing(), Boolean(options.yaml)));
    return;
  }

  if (options.host !== undefined) {
    const vars = inventory.getHostVars(options.host);
    if (!vars) {
      throw new InventoryDataError(`Could not find host ${options.host} in inventory`, { entity: options.host });
    }
    io.stdout(render(vars, Boolean(options.yaml)));
    return;
  }

  const root = typeof options.graph === 'string' ? options.graph : undefined;
  io.stdout(`${inventory.toGraph(root)}\n`);
}

function printRegions(io: CliIO): void {
  const table = new Table({
    head: ['Region', 'Location', 'Endpoint'],
    style: { head: ['cyan'] },
  });

  for (const region of listRegions()) {
    table.push([region.code, region.location, region.endpoint]);
  }

  io.stdout(`${table.toString()}\n`);
}

function reportError(err: unknown, io: CliIO): void {
  const message = err instanceof Error ? err.message : String(err);
  io.stderr(`${chalk.red(`ERROR! ${message}`)}\n`);
  if (err instanceof BaseError && err.suggestion) {
    io.stderr(`${chalk.gray(err.suggestion)}\n`);
  }
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('cloudsigma-inventory')
    .description('Dynamic inventory of CloudSigma servers')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    })
    .option('-i, --inventory <path>', 'inventory source file (*cloudsigma.yml)')
    .option('--list', 'output all hosts and groups')
    .option('--host <name>', 'output the variables of one host')
    .option('--graph [group]', 'output the group tree, from "all" or the given group')
    .option('-y, --yaml', 'write --list and --host output as YAML')
    .option('--flush-cache', 'ignore the cached API payload and refresh it')
    .option('-v, --verbose', 'log debug output on stderr')
    .action(async (options: CliOptions) => {
      await runInventory(options, io);
    });

  program
    .command('regions')
    .description('List the CloudSigma regions and their API endpoints')
    .action(() => {
      printRegions(io);
    });

  return program;
}

/** Runs the CLI and resolves to the process exit code. */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    reportError(err, io);
    return 1;
  }
}
