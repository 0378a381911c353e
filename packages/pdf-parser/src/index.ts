export { OcrService } from './core/ocr-service';
export type {
  OcrDocumentResult,
  OcrProcessOptions,
  OcrServiceDeps,
  OcrServiceOptions,
} from './core/ocr-service';
export { PdfExtractor } from './core/pdf-extractor';
export type {
  ExtractionTuning,
  PdfExtractorDeps,
  PdfExtractorOptions,
} from './core/pdf-extractor';
export {
  ExtractionError,
  PageFailureThresholdError,
  PdfToolError,
} from './errors/extraction-error';
export { ImagePreprocessor } from './processors/image-preprocessor';
export { OcrEngine } from './processors/ocr-engine';
export { PageRenderer } from './processors/page-renderer';
export { ParallelPageProcessor } from './processors/parallel-page-processor';
export type {
  CollectedOutcomes,
  ParallelProcessOptions,
} from './processors/parallel-page-processor';
export { PdfImageLister } from './processors/pdf-image-lister';
export { PdfInfoReader } from './processors/pdf-info-reader';
export type { PdfInfo } from './processors/pdf-info-reader';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export { StructuredPageParser } from './processors/structured-page-parser';
export { DocumentSampler } from './samplers/document-sampler';
export type { DocumentSample } from './samplers/document-sampler';
