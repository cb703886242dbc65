import type { CombinedResult, PageImage, RecognitionEngine } from '../types';
import { throwIfAborted } from '../utils/clock';
import { DecodeError, EngineUnavailableError, NotFoundError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { DEFAULT_DPI, renderPdf, resolveDpi } from '../utils/pdfRasterizer';
import type { DocumentSource } from './documentSource';
import type { EngineRegistry } from './engineRegistry';
import { MATHPIX_ENGINE_NAME } from './mathpixEngine';

export type ConversionStep = 'fetch' | 'rasterize' | 'recognize';

export interface PdfConverterOptions {
  source: DocumentSource;
  registry: EngineRegistry;
  /** Registry key of the engine that receives the whole PDF */
  engineName?: string;
  dpi?: number;
  password?: string;
}

export interface ConvertOptions {
  signal?: AbortSignal;
  onProgress?: (step: ConversionStep) => void;
}

export interface RenderedDocument {
  documentId: string;
  dpi: number;
  pageImages: readonly PageImage[];
}

const log = createLogger('converter');

/**
 * Turns a document id into page images plus OCR text: fetch the bytes,
 * rasterize locally, hand the original PDF to the remote engine, then pair
 * the two by position. Any failing step fails the whole conversion.
 */
export class PdfConverter {
  private readonly source: DocumentSource;
  private readonly registry: EngineRegistry;
  private readonly engineName: string;
  private readonly dpi: number;
  private readonly password: string | undefined;

  constructor(options: PdfConverterOptions) {
    this.source = options.source;
    this.registry = options.registry;
    this.engineName = options.engineName ?? MATHPIX_ENGINE_NAME;
    this.dpi = resolveDpi(options.dpi ?? DEFAULT_DPI);
    this.password = options.password;
  }

  async convert(documentId: string, options: ConvertOptions = {}): Promise<CombinedResult> {
    const { signal, onProgress } = options;
    const startedAt = performance.now();

    try {
      onProgress?.('fetch');
      const pdfBytes = await this.source.fetch(documentId, signal);
      throwIfAborted(signal);

      onProgress?.('rasterize');
      const pageImages = this.rasterize(pdfBytes, this.dpi);
      log.info('pdf_rasterized', { documentId, pages: pageImages.length, dpi: this.dpi });
      throwIfAborted(signal);

      onProgress?.('recognize');
      const engine = this.resolveEngine();
      const ocr = await engine.processPdf(pdfBytes, { signal });

      const result: CombinedResult = {
        documentId,
        recognizedText: ocr.text,
        engineUsed: ocr.engine,
        confidence: ocr.confidence,
        processingTimeMs: ocr.processingTimeMs,
        pageImages,
      };
      log.info('conversion_completed', {
        documentId,
        engine: ocr.engine,
        pages: pageImages.length,
        durationMs: Math.round(performance.now() - startedAt),
      });
      return result;
    } catch (error) {
      log.error('conversion_failed', { documentId, ...describeError(error) });
      throw error;
    }
  }

  /**
   * Page images only, without OCR. Non-positive DPI means the default.
   */
  async renderImages(documentId: string, dpi?: number, signal?: AbortSignal): Promise<RenderedDocument> {
    const resolvedDpi = resolveDpi(dpi);
    const pdfBytes = await this.source.fetch(documentId, signal);
    throwIfAborted(signal);
    return {
      documentId,
      dpi: resolvedDpi,
      pageImages: this.rasterize(pdfBytes, resolvedDpi),
    };
  }

  private rasterize(pdfBytes: Uint8Array, dpi: number): readonly PageImage[] {
    const pageImages = renderPdf(pdfBytes, dpi, { password: this.password });
    if (pageImages.length === 0) {
      throw new DecodeError('No images generated from PDF');
    }
    return pageImages;
  }

  private resolveEngine(): RecognitionEngine {
    try {
      return this.registry.get(this.engineName);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new EngineUnavailableError(this.engineName, { cause: error });
      }
      throw error;
    }
  }
}
