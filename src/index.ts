#!/usr/bin/env node
import { Command } from 'commander';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerCacheCommand } from './commands/cache.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerCostsCommand } from './commands/costs.js';

const program = new Command();

program
  .name('meeting-digest')
  .description('Turn a week of public meeting records into a reader-facing digest')
  .version('0.1.0');

registerAnalyzeCommand(program);
registerCacheCommand(program);
registerHistoryCommand(program);
registerCostsCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
