/**
 * A record recovered from a fenced structured log. Only the `source_file` tag is
 * guaranteed; every other field is whatever the model wrote.
 */
export interface LogEntry {
  source_file: string;
  [field: string]: unknown;
}

export type VoteLogEntry = LogEntry;
export type SpendingLogEntry = LogEntry;

export interface ExtractionRecord {
  source: string;
  notes: string;
  votes: VoteLogEntry[];
  spending: SpendingLogEntry[];
  cachedAt: string;
}

export interface MeetingExtract {
  source: string;
  notes: string;
}
