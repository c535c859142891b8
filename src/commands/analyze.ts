import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, isProviderId, DEFAULT_MODELS, PROVIDERS, type Config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { modelDisplayName } from '../utils/pricing.js';
import { createRunServices, runPipeline, type RunMode } from '../modules/pipeline/run.js';
import { PipelineError } from '../modules/pipeline/errors.js';

interface AnalyzeOptions {
  provider?: string;
  model?: string;
  file?: string;
  retryFailed?: boolean;
  digestOnly?: boolean;
  lookbackDays?: number;
  clearCache?: boolean;
  dryRun?: boolean;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new Error(`Invalid number of days: ${value}`);
  }
  return days;
}

function resolveOverrides(opts: AnalyzeOptions): Partial<Config> {
  const overrides: Partial<Config> = { dryRun: opts.dryRun ?? false };
  if (opts.provider !== undefined) {
    if (!isProviderId(opts.provider)) {
      throw new PipelineError(`Unknown provider "${opts.provider}" (expected ${PROVIDERS.join(' or ')})`);
    }
    overrides.provider = opts.provider;
    overrides.model = opts.model ?? DEFAULT_MODELS[opts.provider];
  } else if (opts.model !== undefined) {
    overrides.model = opts.model;
  }
  if (opts.lookbackDays !== undefined) overrides.lookbackDays = opts.lookbackDays;
  return overrides;
}

function resolveMode(opts: AnalyzeOptions): RunMode {
  if (opts.retryFailed && opts.digestOnly) {
    throw new PipelineError('--retry-failed and --digest-only cannot be combined');
  }
  if (opts.digestOnly) return 'digest-only';
  if (opts.retryFailed) return 'retry-failed';
  return 'full';
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Extract each meeting, then consolidate the week into one digest')
    .option('--provider <provider>', `LLM provider (${PROVIDERS.join(', ')})`)
    .option('--model <model>', 'Override the default model for the provider')
    .option('--file <path>', 'Analyze a single transcript or minutes file')
    .option('--retry-failed', 'Reuse cached extracts and only process new or failed documents')
    .option('--digest-only', 'Skip extraction and regenerate the digest from cached extracts')
    .option('--lookback-days <days>', 'Only process documents from the last N days', parseDays)
    .option('--clear-cache', 'Clear the extraction cache before running')
    .option('--dry-run', 'Do not write draft files or newsletter rows')
    .action(async (opts: AnalyzeOptions) => {
      let services: ReturnType<typeof createRunServices> | undefined;
      const spinner = ora();

      try {
        const mode = resolveMode(opts);
        const config = loadConfig(resolveOverrides(opts));
        createLogger(config.logLevel);
        services = createRunServices(config);

        console.log(chalk.bold(`\n${config.publicationName}`) + chalk.dim(` — ${mode} run with ${modelDisplayName(config.model)}\n`));
        spinner.start('Analyzing meetings...');

        const summary = await runPipeline(config, services, {
          mode,
          file: opts.file,
          clearCache: opts.clearCache ?? false,
        });

        spinner.succeed(
          `Digest generated from ${summary.digest.sources.length} meeting(s) ` +
          `(${summary.outcomes.succeeded} extracted, ${summary.outcomes.cached} cached, ${summary.outcomes.failed} failed)`,
        );

        console.log('\n' + chalk.cyan('━'.repeat(60)));
        console.log(chalk.bold(summary.digest.title));
        console.log(chalk.cyan('━'.repeat(60)));
        console.log(summary.digest.markdown);
        console.log(chalk.cyan('━'.repeat(60)));

        if (summary.votesPath) console.log(chalk.dim(`Votes: ${summary.votesPath}`));
        if (summary.draftPath) console.log(chalk.green(`Draft saved to: ${summary.draftPath}`));
        if (summary.newsletterId !== null) console.log(chalk.dim(`Newsletter row: #${summary.newsletterId}`));
        if (config.dryRun) console.log(chalk.yellow('Dry run — nothing saved'));
        console.log(chalk.dim(`LLM calls: ${summary.calls}`));
      } catch (err) {
        spinner.stop();
        const message = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`\nError: ${message}`));
        process.exitCode = err instanceof PipelineError ? err.exitCode : 1;
      } finally {
        services?.close();
      }
    });
}
