export type DocumentKind = 'transcript' | 'minutes' | 'agenda' | 'budget';

export interface MeetingDocument {
  /** File name within its collection, conventionally `YYYY-MM-DD_<source>_<body>.txt` */
  identifier: string;
  content: string;
  kind: DocumentKind;
}
