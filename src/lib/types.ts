export type Provenance =
  | "PRECISE"
  | "FALLBACK"
  | "TEXT"
  | "TEXT_BODY"
  | "OCR"
  | "CACHED"
  | "INLINE";

export type Confidence = "HIGH" | "MEDIUM" | "LOW";

export interface CandidateCode {
  readonly code: string;
  readonly slotHint?: string;
  /** YYYY-MM-DD */
  readonly dateHint?: string;
  readonly courseHint?: string;
  readonly provenance: Provenance;
  readonly confidence: Confidence;
}

export interface CalendarDayAnchor {
  /** Portal form `D_Mon_YY`, e.g. 20_Aug_25 */
  anchorId: string;
  date: Date;
}

export interface SubmissionEntry {
  dayAnchor: CalendarDayAnchor;
  displayText: string;
  courseHint: string;
  consumed: boolean;
}

// Local file / remote feed entry: { "slot"?, "date"?, "code" }
export interface CodeFileEntry {
  slot?: string;
  date?: string;
  code: string;
}

export interface ImageRef {
  url: string;
  /** URL as it appeared in the message, before soft-wrap cleanup */
  originalUrl: string;
  alt: string;
  messageSubject: string;
}

export interface MailMessage {
  subject: string;
  preview: string;
  body: string;
  images: ImageRef[];
}

export const UNKNOWN_COURSE = "UNKNOWN";
