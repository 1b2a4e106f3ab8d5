#!/usr/bin/env node

import { Command } from 'commander';
import packageJson from '../package.json';
import { buildCommand } from './commands/build';
import { fixCommand } from './commands/fix';
import { lintCommand } from './commands/lint';
import { navCommand } from './commands/nav';
import { scaffoldCommand } from './commands/scaffold';
import { searchCommand } from './commands/search';
import { syncIndexCommand } from './commands/sync-index';
import { verifyCommand } from './commands/verify';

const program = new Command();

program
  .name('wafr-docs')
  .description('Lint, fix, verify and index Well-Architected Framework documentation')
  .version(packageJson.version);

program.addCommand(lintCommand);
program.addCommand(fixCommand);
program.addCommand(navCommand);
program.addCommand(verifyCommand);
program.addCommand(scaffoldCommand);
program.addCommand(syncIndexCommand);
program.addCommand(buildCommand);
program.addCommand(searchCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
