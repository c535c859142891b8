import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { ExtractionCache } from '../modules/extraction/cache.js';

export function registerCacheCommand(program: Command): void {
  const cache = program.command('cache').description('Inspect or clear the extraction cache');

  cache
    .command('list')
    .description('List cached meeting extracts')
    .action(() => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const store = new ExtractionCache(config.extractCacheDir);

      const keys = store.list();
      if (keys.length === 0) {
        console.log(chalk.dim('Extraction cache is empty'));
        return;
      }

      console.log(chalk.bold(`\n${keys.length} cached extract(s)\n`));
      for (const key of keys) {
        const record = store.load(key);
        if (!record) {
          console.log(`  ${chalk.red('✗')} ${key} ${chalk.dim('(unreadable)')}`);
          continue;
        }
        console.log(
          `  ${chalk.green('✓')} ${record.source} ` +
          chalk.dim(`${record.votes.length} votes, ${record.spending.length} spending, cached ${record.cachedAt}`),
        );
      }
    });

  cache
    .command('clear')
    .description('Delete every cached extract (forces re-extraction)')
    .action(() => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const removed = new ExtractionCache(config.extractCacheDir).clearAll();
      console.log(chalk.green(`Cleared ${removed} cached extract(s)`));
    });
}
