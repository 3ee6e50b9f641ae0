import type { Document } from 'domhandler';

export type HeadingLevel = 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';

/** Level → count. Levels that never occur are absent, never zero. */
export type HeadingHistogram = Partial<Record<HeadingLevel, number>>;

export type LinkClass = 'internal' | 'external' | 'inaccessible';

export interface LinkCounts {
  internal: number;
  external: number;
  inaccessible: number;
}

/**
 * Parsed page shared read-only by every extraction pass of one request.
 */
export interface DocumentHandle {
  readonly root: Document;
  readonly byteLength: number;
}

export interface AnalysisRecord {
  readonly url: string;
  readonly htmlVersion: string;
  readonly pageTitle: string;
  readonly headings: Readonly<HeadingHistogram>;
  readonly internalLinks: number;
  readonly externalLinks: number;
  readonly inaccessibleLinks: number;
  readonly hasLoginForm: boolean;
  /** RFC 3339 timestamp taken when extraction started. */
  readonly analyzedAt: string;
  readonly processingTime: string;
}

/** Wire shape of {@link AnalysisRecord}. */
export interface AnalysisResponse {
  url: string;
  html_version: string;
  page_title: string;
  headings: HeadingHistogram;
  internal_links: number;
  external_links: number;
  inaccessible_links: number;
  has_login_form: boolean;
  analyzed_at: string;
  processing_time: string;
}

export interface AnalysisErrorResponse {
  status_code: number;
  error_message: string;
  url: string;
}
