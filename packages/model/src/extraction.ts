export type ExtractionType = 'text' | 'structured' | 'ocr';

/**
 * Caller-selected extraction options.
 */
export interface ExtractionOptions {
  extractionType: ExtractionType;
  includeImages: boolean;
  includeMetadata: boolean;
  /** Trade accuracy for latency (lower DPI, no preprocessing, always parallel) */
  fastMode: boolean;
  useCache: boolean;
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  extractionType: 'text',
  includeImages: false,
  includeMetadata: false,
  fastMode: false,
  useCache: true,
};

/**
 * Outcome of a single page unit. A rejected page never aborts its siblings.
 */
export type PageOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: string };

export interface PageText {
  /** 1-based page number */
  page: number;
  content: string;
}

export type StructuredElementType = 'heading' | 'paragraph';

export interface StructuredElement {
  type: StructuredElementType;
  content: string;
}

/** A table as rows of cell strings */
export type TableRows = string[][];

export interface StructuredPage {
  page: number;
  elements: StructuredElement[];
  tables: TableRows[];
  rawText: string;
}

export interface ImageInfo {
  page: number;
  /** 0-based index of the image on its page */
  index: number;
  width: number;
  height: number;
  type: 'image';
}

export interface FailedPage {
  page: number;
  reason: string;
}

interface BaseExtractionResult {
  pages: number;
  failedPages: FailedPage[];
  metadata?: Record<string, string>;
  images?: ImageInfo[];
}

export interface TextExtractionResult extends BaseExtractionResult {
  type: 'text';
  content: PageText[];
}

export interface StructuredExtractionResult extends BaseExtractionResult {
  type: 'structured';
  content: StructuredPage[];
}

export interface OcrExtractionResult extends BaseExtractionResult {
  type: 'ocr';
  content: PageText[];
}

export type ExtractionResult =
  | TextExtractionResult
  | StructuredExtractionResult
  | OcrExtractionResult;

/**
 * Envelope returned by a finished extraction.
 */
export interface ExtractionOutcome {
  status: 'success';
  content: ExtractionResult;
  /** Seconds */
  executionTime: number;
  cacheHit: boolean;
}
