/**
 * Page fan-out policy
 */
export const PAGE_PROCESSING = {
  /**
   * Plain-text extraction runs sequentially up to this many pages
   */
  TEXT_SEQUENTIAL_THRESHOLD: 5,

  /**
   * Structured extraction runs sequentially up to this many pages
   */
  STRUCTURED_SEQUENTIAL_THRESHOLD: 3,

  /**
   * Default worker budget when no tuned value is supplied
   */
  DEFAULT_WORKERS: 4,
} as const;

/**
 * Configuration constants for OcrService
 */
export const OCR = {
  /**
   * Rasterization DPI when no tuned value is supplied
   */
  DEFAULT_DPI: 300,

  /**
   * Rasterization DPI in fast mode
   */
  FAST_MODE_DPI: 150,

  /**
   * Tesseract language code
   */
  DEFAULT_LANGUAGE: 'eng',

  /**
   * Binarization threshold for preprocessing (200 of 255)
   */
  THRESHOLD_PERCENT: 78,

  /**
   * Per-page tesseract timeout in milliseconds
   */
  PAGE_TIMEOUT_MS: 120_000,
} as const;

/**
 * Configuration constants for DocumentSampler
 */
export const SAMPLING = {
  /**
   * Pages inspected from the start of the document
   */
  MAX_SAMPLE_PAGES: 3,

  /**
   * A first page with fewer text characters than this counts as image-only
   */
  SCANNED_TEXT_MIN_CHARS: 100,
} as const;

/**
 * Heuristics used by StructuredPageParser
 */
export const STRUCTURE = {
  HEADING_MAX_WORDS: 8,
  HEADING_MAX_CHARS: 100,
  HEADING_ENDINGS: ['.', ':', '?', '!'],
  TABLE_MIN_ROWS: 2,
  TABLE_MIN_COLUMNS: 2,
} as const;
