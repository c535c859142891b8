import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { openDb } from '../modules/state/db.js';
import { createGenerationModel } from '../modules/state/models/generations.js';
import { modelDisplayName } from '../utils/pricing.js';

interface CostsOptions {
  days?: number;
  json?: boolean;
}

function dollars(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

export function registerCostsCommand(program: Command): void {
  program
    .command('costs')
    .description('Summarize LLM spend recorded for recent runs')
    .option('--days <days>', 'Lookback window in days', (v: string) => Number(v), 30)
    .option('--json', 'Output as JSON')
    .action((opts: CostsOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      if (!config.dbPath) {
        console.log(chalk.yellow('No database configured. Set MEETING_DIGEST_DB to track costs.'));
        return;
      }

      const days = opts.days !== undefined && Number.isFinite(opts.days) ? opts.days : 30;
      const db = openDb(config.dbPath);
      try {
        const summary = createGenerationModel(db).getCostSummary(days);

        if (opts.json) {
          console.log(JSON.stringify({ days, ...summary }, null, 2));
          return;
        }

        console.log(chalk.bold(`\nLLM costs (last ${days} days)\n`));
        console.log(`  Calls:   ${summary.totalCalls}`);
        console.log(`  Tokens:  ${summary.totalInputTokens.toLocaleString()} in / ${summary.totalOutputTokens.toLocaleString()} out`);
        console.log(`  Total:   ${chalk.green(dollars(summary.totalCostCents))}`);

        const models = Object.entries(summary.byModel);
        if (models.length > 0) {
          console.log(chalk.bold('\n  By model'));
          for (const [model, data] of models) {
            console.log(`    ${modelDisplayName(model).padEnd(10)} ${String(data.calls).padStart(4)} calls  ${dollars(data.costCents)}`);
          }
        }

        const purposes = Object.entries(summary.byPurpose);
        if (purposes.length > 0) {
          console.log(chalk.bold('\n  By purpose'));
          for (const [purpose, data] of purposes) {
            console.log(`    ${purpose.padEnd(10)} ${String(data.calls).padStart(4)} calls  ${dollars(data.costCents)}`);
          }
        }
        console.log();
      } finally {
        db.close();
      }
    });
}
