/**
 * Progress steps of an extraction task, out of 100
 */
export const TASK_STEPS = {
  INITIALIZING: 0,
  ANALYZING: 20,
  OPTIMIZING: 40,
  EXTRACTING: 60,
  FINALIZING: 90,
  COMPLETED: 100,
} as const;

export const EXTRACTION_TOTAL_STEPS = TASK_STEPS.COMPLETED;

export const EXTRACTION_STEP_DESCRIPTIONS: Readonly<Record<number, string>> = {
  [TASK_STEPS.INITIALIZING]: 'Initializing',
  [TASK_STEPS.ANALYZING]: 'Analyzing document',
  [TASK_STEPS.OPTIMIZING]: 'Optimizing processing parameters',
  [TASK_STEPS.EXTRACTING]: 'Extracting content',
  [TASK_STEPS.FINALIZING]: 'Finalizing results',
  [TASK_STEPS.COMPLETED]: 'Completed',
};

/**
 * Lifetimes of finished tasks
 */
export const TASK_RETENTION = {
  /** A finished task leaves the active set after this long */
  ACTIVE_MS: 300_000,

  /** A finished task is swept from the registry once idle this long */
  REGISTRY_MS: 3_600_000,
} as const;

const MIB = 1024 * 1024;

/**
 * Rule thresholds used by PerformanceOptimizer
 */
export const OPTIMIZER = {
  SMALL_DOCUMENT_PAGES: 5,
  SMALL_DOCUMENT_MAX_WORKERS: 2,
  LARGE_DOCUMENT_PAGES: 50,
  LARGE_DOCUMENT_EXTRA_WORKERS: 2,
  MAX_WORKERS: 8,
  SCANNED_EXTRA_WORKERS: 1,
  SCANNED_MAX_WORKERS: 6,
  HEAVY_PAGE_BYTES: MIB,
  HEAVY_PAGE_MIN_WORKERS: 2,

  DEFAULT_DPI: 300,
  REDUCED_DPI: 200,
  REDUCED_DPI_PAGE_BYTES: 2 * MIB,
  LOW_DPI: 150,
  LOW_DPI_PAGE_BYTES: 5 * MIB,

  SCANNED_PREPROCESS_MAX_PAGE_BYTES: 4 * MIB,
  TEXT_PREPROCESS_MAX_PAGE_BYTES: 2 * MIB,

  /** [page count upper bound (exclusive), chunk size] */
  CHUNK_RULES: [
    [50, 10],
    [100, 20],
  ],
  SINGLE_CHUNK_PAGES: 20,
  MAX_CHUNK_SIZE: 30,
} as const;

/**
 * Download settings for URL sources
 */
export const DOWNLOAD = {
  TIMEOUT_MS: 30_000,
  FILE_PREFIX: 'download_',
} as const;
