import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadContext, loadPromptSet, loadSystemPrompt } from './loader.js';

describe('prompt loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'prompts-'));
    fs.writeFileSync(path.join(dir, 'extract.md'), '---\nmaxTokens: 3000\n---\n\nExtract the facts.\n');
    fs.writeFileSync(path.join(dir, 'newsletter.md'), 'Write the digest.\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads frontmatter token limits and falls back to defaults', () => {
    expect(loadSystemPrompt(dir, 'extract')).toEqual({ name: 'extract', text: 'Extract the facts.', maxTokens: 3000 });
    expect(loadSystemPrompt(dir, 'newsletter')).toEqual({ name: 'newsletter', text: 'Write the digest.', maxTokens: 8000 });
  });

  it('prepends the project context to both prompts', () => {
    const contextFile = path.join(dir, 'context.md');
    fs.writeFileSync(contextFile, 'Covering the Springfield council.\n');

    const prompts = loadPromptSet(dir, contextFile);

    expect(prompts.extract.text).toBe('Covering the Springfield council.\n\nExtract the facts.');
    expect(prompts.newsletter.text).toBe('Covering the Springfield council.\n\nWrite the digest.');
  });

  it('treats a missing context file as empty', () => {
    expect(loadContext(path.join(dir, 'missing.md'))).toBe('');
  });

  it('loads the shipped prompts', () => {
    const shipped = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../prompts');
    const prompts = loadPromptSet(shipped, path.join(dir, 'missing.md'));
    expect(prompts.extract.maxTokens).toBe(4000);
    expect(prompts.newsletter.maxTokens).toBe(8000);
    expect(prompts.extract.text).toContain('```vote-log');
    expect(prompts.extract.text).toContain('```spending-log');
  });
});
