#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerCompareCommand } from './commands/compare-cmd.js';
import { registerParamsCommand } from './commands/params-cmd.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();
program
  .name('cmdbench')
  .description('cmdbench: compare command-line benchmark results by relative speed')
  .version(pkg.version);

registerCompareCommand(program);
registerParamsCommand(program);

await program.parseAsync();
