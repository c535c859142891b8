import { describe, expect, it, vi } from 'vitest';
import { getLogger } from '../../utils/logger.js';
import { findFencedBlock, parseSpendingLog, parseVoteLog } from './log-parser.js';

const output = [
  '# Meeting notes',
  '',
  'The council met.',
  '',
  '```vote-log',
  '{"meeting": "Council", "motion": "Approve minutes", "unanimous": true}',
  '',
  '{"meeting": "Council", "motion": "Rezone lot 4", "unanimous": false, "no": ["Smith"]}',
  '```',
  '',
  '```spending-log',
  '{"vendor": "Acme Paving", "amount": 1500.5}',
  '{"vendor": "Broken", "amount": ',
  '["not", "an", "object"]',
  '{"vendor": "N/A", "amount": "$2,000.00"}',
  '```',
].join('\n');

describe('findFencedBlock', () => {
  it('returns the body of the tagged block', () => {
    expect(findFencedBlock('```vote-log\n{"a":1}\n```', 'vote-log')).toBe('{"a":1}\n');
  });

  it('returns null when the tag is absent', () => {
    expect(findFencedBlock('```json\n{}\n```', 'vote-log')).toBeNull();
  });
});

describe('parseVoteLog', () => {
  it('parses each line in order and tags the source', () => {
    const votes = parseVoteLog(output, '2026-01-05_Council.txt');
    expect(votes).toEqual([
      { meeting: 'Council', motion: 'Approve minutes', unanimous: true, source_file: '2026-01-05_Council.txt' },
      {
        meeting: 'Council',
        motion: 'Rezone lot 4',
        unanimous: false,
        no: ['Smith'],
        source_file: '2026-01-05_Council.txt',
      },
    ]);
  });

  it('returns nothing without a block or with an empty one', () => {
    expect(parseVoteLog('No votes today.', 'x.txt')).toEqual([]);
    expect(parseVoteLog('```vote-log\n\n```', 'x.txt')).toEqual([]);
  });
});

describe('parseSpendingLog', () => {
  it('skips malformed and non-object lines with a warning', () => {
    const warn = vi.spyOn(getLogger(), 'warn');

    const items = parseSpendingLog(output, 'src.txt');

    expect(items).toEqual([
      { vendor: 'Acme Paving', amount: 1500.5, source_file: 'src.txt' },
      { vendor: 'N/A', amount: '$2,000.00', source_file: 'src.txt' },
    ]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      { source: 'src.txt', tag: 'spending-log', line: '{"vendor": "Broken", "amount":' },
      'Skipping malformed log line',
    );

    warn.mockRestore();
  });

  it('overrides a source_file written by the model', () => {
    const items = parseSpendingLog('```spending-log\n{"source_file": "other", "amount": 1}\n```', 'mine.txt');
    expect(items).toEqual([{ source_file: 'mine.txt', amount: 1 }]);
  });
});
