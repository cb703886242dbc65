export type * from './types';

export { loadConfig, buildEngineRegistry } from './config';
export type { AppConfig, EngineDependencies, MathpixCredentials } from './config';

export { PdfConverter } from './services/pdfConverter';
export type { ConvertOptions, ConversionStep, PdfConverterOptions, RenderedDocument } from './services/pdfConverter';

export { EngineRegistry, createEngineRegistry, FALLBACK_ENGINE_NAME } from './services/engineRegistry';
export type { EngineRegistryInit } from './services/engineRegistry';

export {
  MathpixClient,
  MATHPIX_PDF_API_URL,
  MATHPIX_POLL_INTERVAL_MS,
  MATHPIX_TIMEOUT_MS,
} from './services/mathpixClient';
export type { FetchFn, JobDocument, MathpixClientOptions, RunJobOptions } from './services/mathpixClient';

export { MathpixEngine, MATHPIX_ENGINE_NAME } from './services/mathpixEngine';
export { MockEngine, MOCK_ENGINE_NAME } from './services/mockEngine';
export { TesseractEngine, TESSERACT_ENGINE_NAME } from './services/tesseractEngine';
export type { OcrWorker, OcrWorkerFactory } from './services/tesseractEngine';

export { FileSystemDocumentSource } from './services/documentSource';
export type { DocumentSource } from './services/documentSource';

export { renderPdf, countPdfPages, resolveDpi, DEFAULT_DPI } from './utils/pdfRasterizer';
export { encodeBase64, isTransportSafeBase64, readPngDimensions, toDataUrl } from './utils/imageEncoding';
export { toToolContent, formatConversionReport } from './utils/toolContent';
export { suggestDocumentType } from './utils/documentClassifier';
export { systemClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { createLogger, setLogLevel } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export * from './utils/errors';
