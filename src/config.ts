import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project root is one level up from both src/ (tsx) and dist/ (built)
const PROJECT_ROOT = path.resolve(__dirname, '..');

export type ProviderId = 'anthropic' | 'openai';

export const PROVIDERS: readonly ProviderId[] = ['anthropic', 'openai'];

export function isProviderId(value: string): value is ProviderId {
  return (PROVIDERS as readonly string[]).includes(value);
}

export interface Config {
  // Text generation
  anthropicApiKey: string;
  openaiApiKey: string;
  provider: ProviderId;
  model: string;

  // Publication
  publicationName: string;

  // Paths
  dataDir: string;
  transcriptsDir: string;
  agendasDir: string;
  minutesDir: string;
  budgetDir: string;
  votesDir: string;
  draftsDir: string;
  extractCacheDir: string;
  promptsDir: string;
  contextFile: string;

  // Persistence (empty path = file-only mode)
  dbPath: string;

  // Windows
  lookbackDays: number;
  historyLookbackDays: number;

  // Gateway
  maxRetries: number;
  retryBaseSeconds: number;
  phase1DelaySeconds: Record<ProviderId, number>;
  phase2DelaySeconds: Record<ProviderId, number>;

  // Logging
  logLevel: string;

  // Dry run
  dryRun: boolean;
}

export const DEFAULT_MODELS: Record<ProviderId, string> = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o',
};

function loadEnvFile(): void {
  const envPath = path.resolve(PROJECT_ROOT, '.env');

  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    // .env is optional
    return;
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim();
      if (!process.env[key]) process.env[key] = val;
    }
  }
}

function loadRcFile(): Record<string, unknown> {
  const rcPath = path.resolve(PROJECT_ROOT, '.meetingdigestrc.json');
  let raw: string;
  try {
    raw = fs.readFileSync(rcPath, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${rcPath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  loadEnvFile();
  const rc = loadRcFile();

  const str = (envKey: string, fallback = ''): string => {
    const fromEnv = process.env[envKey];
    if (fromEnv !== undefined && fromEnv !== '') return fromEnv;
    const fromRc = rc[envKey];
    return typeof fromRc === 'string' ? fromRc : fallback;
  };

  const num = (envKey: string, fallback: number): number => {
    const fromEnv = Number(process.env[envKey]);
    if (Number.isFinite(fromEnv) && process.env[envKey]) return fromEnv;
    const fromRc = rc[envKey];
    return typeof fromRc === 'number' ? fromRc : fallback;
  };

  const providerRaw = overrides.provider ?? str('LLM_PROVIDER', 'anthropic');
  if (!isProviderId(providerRaw)) {
    throw new Error(`Unknown LLM provider "${providerRaw}" (expected ${PROVIDERS.join(' or ')})`);
  }

  const dataDir = overrides.dataDir ?? path.resolve(PROJECT_ROOT, str('DATA_DIR', 'data'));

  return {
    anthropicApiKey: overrides.anthropicApiKey ?? str('ANTHROPIC_API_KEY'),
    openaiApiKey: overrides.openaiApiKey ?? str('OPENAI_API_KEY'),
    provider: providerRaw,
    model: overrides.model ?? str('LLM_MODEL', DEFAULT_MODELS[providerRaw]),

    publicationName: overrides.publicationName ?? str('PUBLICATION_NAME', 'Meeting Digest'),

    dataDir,
    transcriptsDir: overrides.transcriptsDir ?? path.join(dataDir, 'transcripts'),
    agendasDir: overrides.agendasDir ?? path.join(dataDir, 'agendas'),
    minutesDir: overrides.minutesDir ?? path.join(dataDir, 'minutes'),
    budgetDir: overrides.budgetDir ?? path.join(dataDir, 'budget'),
    votesDir: overrides.votesDir ?? path.join(dataDir, 'votes'),
    draftsDir: overrides.draftsDir ?? path.join(dataDir, 'drafts'),
    extractCacheDir: overrides.extractCacheDir ?? path.join(dataDir, 'extracts'),
    promptsDir: overrides.promptsDir ?? path.resolve(PROJECT_ROOT, 'prompts'),
    contextFile: overrides.contextFile ?? path.resolve(PROJECT_ROOT, str('CONTEXT_FILE', 'project_context.md')),

    dbPath: overrides.dbPath ?? str('MEETING_DIGEST_DB'),

    lookbackDays: overrides.lookbackDays ?? num('LOOKBACK_DAYS', 14),
    historyLookbackDays: overrides.historyLookbackDays ?? num('HISTORY_LOOKBACK_DAYS', 365),

    maxRetries: overrides.maxRetries ?? num('LLM_MAX_RETRIES', 3),
    retryBaseSeconds: overrides.retryBaseSeconds ?? num('LLM_RETRY_BASE_SECONDS', 30),
    phase1DelaySeconds: overrides.phase1DelaySeconds ?? {
      anthropic: num('ANTHROPIC_CALL_DELAY_SECONDS', 30),
      openai: num('OPENAI_CALL_DELAY_SECONDS', 60),
    },
    phase2DelaySeconds: overrides.phase2DelaySeconds ?? {
      anthropic: num('ANTHROPIC_PHASE2_DELAY_SECONDS', 120),
      openai: num('OPENAI_PHASE2_DELAY_SECONDS', 90),
    },

    logLevel: overrides.logLevel ?? str('LOG_LEVEL', 'info'),
    dryRun: overrides.dryRun ?? false,
  };
}
