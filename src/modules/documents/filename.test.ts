import { describe, expect, it } from 'vitest';
import { hasSameDate, matchByDate, parseDatePrefix, parseDocumentName, stripExtension } from './filename.js';
import type { MeetingDocument } from './types.js';

function doc(identifier: string, kind: MeetingDocument['kind'] = 'agenda'): MeetingDocument {
  return { identifier, content: '', kind };
}

describe('parseDatePrefix', () => {
  it('reads the leading ISO date', () => {
    expect(parseDatePrefix('2026-01-05_meetingA.txt')).toBe('2026-01-05');
    expect(parseDatePrefix('transcripts/2026-01-05_meetingA.txt')).toBe('2026-01-05');
  });

  it('rejects missing and impossible dates', () => {
    expect(parseDatePrefix('meetingA.txt')).toBeNull();
    expect(parseDatePrefix('2026-02-30_meeting.txt')).toBeNull();
    expect(parseDatePrefix('2026-01-051_meeting.txt')).toBeNull();
  });
});

describe('parseDocumentName', () => {
  it('drops the source token and trailing recording date', () => {
    const parsed = parseDocumentName('2026-01-28_Municipality_Commission_Meeting_-_01272026.txt');
    expect(parsed).toEqual({
      date: '2026-01-28',
      body: 'Commission Meeting',
      kind: 'transcript',
      stem: '2026-01-28_Municipality_Commission_Meeting_-_01272026',
    });
  });

  it('takes the kind from a kind token', () => {
    const parsed = parseDocumentName('2026-01-27_township_minutes_CM.txt');
    expect(parsed.kind).toBe('minutes');
    expect(parsed.body).toBe('CM');
  });

  it('falls back to a placeholder body', () => {
    const parsed = parseDocumentName('2026-01-05_agenda.txt');
    expect(parsed.kind).toBe('agenda');
    expect(parsed.body).toBe('Unknown Meeting');
  });

  it('keeps plain body words', () => {
    expect(parseDocumentName('2026-01-05_meetingA.txt').body).toBe('meetingA');
  });

  it('handles undated identifiers', () => {
    const parsed = parseDocumentName('notes.txt', 'minutes');
    expect(parsed.date).toBeNull();
    expect(parsed.body).toBe('notes');
    expect(parsed.kind).toBe('minutes');
  });
});

describe('stripExtension', () => {
  it('removes directory and extension', () => {
    expect(stripExtension('a/b/2026-01-05_x.txt')).toBe('2026-01-05_x');
    expect(stripExtension('.hidden')).toBe('.hidden');
  });
});

describe('matchByDate', () => {
  const agendas = [doc('2026-01-05_agenda.txt'), doc('2026-01-06_agenda.txt'), doc('agenda.txt')];

  it('returns documents sharing the date prefix', () => {
    expect(matchByDate('2026-01-05_meetingA.txt', agendas).map(d => d.identifier)).toEqual([
      '2026-01-05_agenda.txt',
    ]);
  });

  it('matches nothing for an undated identifier', () => {
    expect(matchByDate('meetingA.txt', agendas)).toEqual([]);
  });
});

describe('hasSameDate', () => {
  it('compares date prefixes only', () => {
    expect(hasSameDate('2026-01-05_minutes.txt', ['2026-01-05_Council.txt'])).toBe(true);
    expect(hasSameDate('2026-01-05_minutes.txt', ['2026-01-06_Council.txt'])).toBe(false);
    expect(hasSameDate('minutes.txt', ['minutes.txt'])).toBe(false);
  });
});
