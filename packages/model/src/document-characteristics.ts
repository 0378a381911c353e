/**
 * Document traits sampled from the first pages of a PDF,
 * used to tune how the document is processed.
 */
export interface DocumentCharacteristics {
  pageCount: number;
  fileSizeBytes: number;
  hasImages: boolean;
  hasTables: boolean;
  /** Pages are likely raster images rather than encoded text */
  isScanned: boolean;
}

/**
 * Processing parameters chosen for a document.
 */
export interface OptimizationParameters {
  /** Concurrent page workers, at least 1 */
  workers: number;
  /** Rasterization DPI */
  resolution: number;
  /** Whether page images are cleaned up before OCR */
  preprocess: boolean;
  /** Pages rendered per batch, at least 1 */
  chunkSize: number;
}
