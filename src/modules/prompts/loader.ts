import fs from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import { getLogger } from '../../utils/logger.js';

export type PromptName = 'extract' | 'newsletter';

export interface SystemPrompt {
  name: PromptName;
  text: string;
  maxTokens: number;
}

export interface PromptSet {
  extract: SystemPrompt;
  newsletter: SystemPrompt;
}

const DEFAULT_MAX_TOKENS: Record<PromptName, number> = {
  extract: 4000,
  newsletter: 8000,
};

/**
 * Read one system prompt. The markdown body is passed to the model as-is;
 * frontmatter may set `maxTokens` for the call.
 */
export function loadSystemPrompt(promptsDir: string, name: PromptName, context = ''): SystemPrompt {
  const file = path.join(promptsDir, `${name}.md`);
  const { data, content } = matter(fs.readFileSync(file, 'utf-8'));

  const maxTokens = typeof data.maxTokens === 'number' && data.maxTokens > 0
    ? data.maxTokens
    : DEFAULT_MAX_TOKENS[name];

  const body = content.trim();
  return {
    name,
    text: context ? `${context}\n\n${body}` : body,
    maxTokens,
  };
}

/**
 * The project context file describes the community being covered and is
 * prepended to every system prompt. It is optional.
 */
export function loadContext(contextFile: string): string {
  if (!fs.existsSync(contextFile)) {
    getLogger().warn({ contextFile }, 'Context file not found, proceeding without it');
    return '';
  }
  return fs.readFileSync(contextFile, 'utf-8').trim();
}

export function loadPromptSet(promptsDir: string, contextFile: string): PromptSet {
  const context = loadContext(contextFile);
  return {
    extract: loadSystemPrompt(promptsDir, 'extract', context),
    newsletter: loadSystemPrompt(promptsDir, 'newsletter', context),
  };
}
