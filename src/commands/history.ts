import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { createPersistence } from '../modules/state/persistence.js';
import { buildHistoricalContext } from '../modules/pipeline/history.js';

interface HistoryOptions {
  days?: number;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('Show the spending and dissent history fed to the digest')
    .option('--days <days>', 'Lookback window in days', (v: string) => Number(v))
    .action((opts: HistoryOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      const persistence = createPersistence(config.dbPath);
      try {
        if (!persistence.enabled) {
          console.log(chalk.yellow('No database configured. Set MEETING_DIGEST_DB to track history.'));
          return;
        }

        const days = opts.days !== undefined && Number.isFinite(opts.days) ? opts.days : config.historyLookbackDays;
        const context = buildHistoricalContext(persistence, days);
        if (!context) {
          console.log(chalk.dim(`No repeat vendors, project spending or dissent in the last ${days} days`));
          return;
        }
        console.log(context);
      } finally {
        persistence.close();
      }
    });
}
