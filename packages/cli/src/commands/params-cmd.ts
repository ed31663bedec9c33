/**
 * CLI command: cmdbench params
 *
 * Splits a comma-separated parameter list (with `\,` and `\\` escapes)
 * and optionally expands a command template once per value.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { parseParameterList, expandCommands } from '@cmdbench/core';

export interface ParamsOptions {
  readonly json?: boolean;
}

/**
 * Run the params command. Returns the process exit code.
 */
export function runParams(
  name: string,
  values: string,
  template: string | undefined,
  options: ParamsOptions,
): number {
  const listResult = parseParameterList(name, values);
  if (listResult.isErr()) {
    // eslint-disable-next-line no-console
    console.error(chalk.red(listResult.error.message));
    return 1;
  }
  const list = listResult.value;

  if (template === undefined) {
    if (options.json) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(list, null, 2));
    } else {
      for (const value of list.values) {
        // eslint-disable-next-line no-console
        console.log(value);
      }
    }
    return 0;
  }

  const commands = expandCommands(template, list);
  if (options.json) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(commands, null, 2));
  } else {
    for (const expanded of commands) {
      // eslint-disable-next-line no-console
      console.log(expanded.command);
    }
  }
  return 0;
}

export function registerParamsCommand(program: Command): void {
  program
    .command('params')
    .description('Split a parameter list and expand a command template with each value')
    .argument('<name>', 'Parameter name, referenced as {name} in the command')
    .argument('<values>', 'Comma-separated values; escape literal commas as \\, and backslashes as \\\\')
    .argument('[command]', 'Command template to expand')
    .option('--json', 'Output in JSON format')
    .action((name: string, values: string, template: string | undefined, options: ParamsOptions) => {
      const code = runParams(name, values, template, options);
      if (code !== 0) process.exit(code);
    });
}
