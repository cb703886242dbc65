import { createWorker } from 'tesseract.js';
import type {
  EngineInfo,
  RecognitionEngine,
  RecognitionOptions,
  RecognitionResult,
  StructuredRecognitionResult,
  TextBlock,
} from '../types';
import { throwIfAborted } from '../utils/clock';
import { readPngDimensions } from '../utils/imageEncoding';
import { clampBox, estimateColumnCount } from '../utils/layoutBlocks';
import { createLogger } from '../utils/logger';
import { renderPdf } from '../utils/pdfRasterizer';

export const TESSERACT_ENGINE_NAME = 'tesseract';

// Scanned text recognizes noticeably better above screen resolution
const DEFAULT_OCR_DPI = 200;

const log = createLogger('tesseract-engine');

// The subset of the tesseract.js worker this engine relies on
export interface OcrBlock {
  text: string;
  confidence: number;
  bbox: { x0: number; y0: number; x1: number; y1: number };
}

export interface OcrPage {
  text: string;
  confidence: number;
  blocks?: OcrBlock[] | null;
}

export interface OcrWorker {
  recognize(image: Buffer, options?: object, output?: { text?: boolean; blocks?: boolean }): Promise<{ data: OcrPage }>;
  terminate(): Promise<unknown>;
}

export type OcrWorkerFactory = (language: string) => Promise<OcrWorker>;

export interface TesseractEngineOptions {
  language?: string;
  ocrDpi?: number;
  createWorker?: OcrWorkerFactory;
}

const defaultWorkerFactory: OcrWorkerFactory = (language) => createWorker(language);

function toUnitConfidence(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score / 100));
}

export class TesseractEngine implements RecognitionEngine {
  private readonly language: string;
  private readonly ocrDpi: number;
  private readonly createWorker: OcrWorkerFactory;
  private worker: Promise<OcrWorker> | null = null;

  constructor(options: TesseractEngineOptions = {}) {
    this.language = options.language ?? 'eng';
    this.ocrDpi = options.ocrDpi ?? DEFAULT_OCR_DPI;
    this.createWorker = options.createWorker ?? defaultWorkerFactory;
  }

  async extractText(image: Uint8Array, options: RecognitionOptions = {}): Promise<RecognitionResult> {
    throwIfAborted(options.signal);
    const start = performance.now();
    const { data } = await this.recognize(image, { text: true });
    return this.toResult(data.text, toUnitConfidence(data.confidence), start);
  }

  async extractStructuredText(
    image: Uint8Array,
    documentTypeHint: string,
    options: RecognitionOptions = {}
  ): Promise<StructuredRecognitionResult> {
    throwIfAborted(options.signal);
    log.debug('structured_extraction', { documentTypeHint });
    const start = performance.now();
    const { data } = await this.recognize(image, { text: true, blocks: true });

    const ocrBlocks = data.blocks ?? [];
    const dimensions = readPngDimensions(image) ?? {
      width: Math.max(1, ...ocrBlocks.map(b => b.bbox.x1)),
      height: Math.max(1, ...ocrBlocks.map(b => b.bbox.y1)),
    };

    const blocks: TextBlock[] = ocrBlocks
      .filter(block => block.text.trim().length > 0)
      .map((block): TextBlock => ({
        text: block.text.trim(),
        confidence: toUnitConfidence(block.confidence),
        blockType: 'paragraph',
        boundingBox: clampBox(
          {
            x: block.bbox.x0,
            y: block.bbox.y0,
            width: block.bbox.x1 - block.bbox.x0,
            height: block.bbox.y1 - block.bbox.y0,
          },
          dimensions.width,
          dimensions.height
        ),
      }));

    return {
      ...this.toResult(data.text, toUnitConfidence(data.confidence), start),
      blocks,
      tables: [],
      layout: {
        pageWidth: dimensions.width,
        pageHeight: dimensions.height,
        orientation: dimensions.width > dimensions.height ? 'landscape' : 'portrait',
        columnCount: estimateColumnCount(blocks, dimensions.width),
        hasTables: false,
        hasDiagrams: false,
      },
    };
  }

  /**
   * Rasterize locally and recognize page by page, in order.
   */
  async processPdf(pdf: Uint8Array, options: RecognitionOptions = {}): Promise<RecognitionResult> {
    throwIfAborted(options.signal);
    const start = performance.now();
    const pages = renderPdf(pdf, this.ocrDpi);

    const texts: string[] = [];
    let confidenceSum = 0;
    for (const page of pages) {
      throwIfAborted(options.signal);
      const { data } = await this.recognize(page.data, { text: true });
      texts.push(data.text.trim());
      confidenceSum += toUnitConfidence(data.confidence);
    }

    log.info('pdf_recognized', { pages: pages.length });
    return this.toResult(texts.filter(t => t.length > 0).join('\n\n'), confidenceSum / pages.length, start);
  }

  info(): EngineInfo {
    return {
      name: 'Tesseract',
      version: '5',
      supportedLanguages: [this.language],
      features: ['text_extraction', 'basic_layout', 'offline'],
      isLocal: true,
      requiresAuth: false,
    };
  }

  async dispose(): Promise<void> {
    if (!this.worker) return;
    const pending = this.worker;
    this.worker = null;
    const worker = await pending;
    await worker.terminate();
  }

  private getWorker(): Promise<OcrWorker> {
    if (!this.worker) {
      const created = this.createWorker(this.language);
      // A failed start is not cached so the next call can try again
      void created.catch(() => {
        if (this.worker === created) this.worker = null;
      });
      this.worker = created;
    }
    return this.worker;
  }

  private async recognize(image: Uint8Array, output: { text?: boolean; blocks?: boolean }) {
    const worker = await this.getWorker();
    return worker.recognize(Buffer.from(image), {}, output);
  }

  private toResult(text: string, confidence: number, start: number): RecognitionResult {
    return {
      text,
      confidence,
      language: this.language,
      engine: TESSERACT_ENGINE_NAME,
      processingTimeMs: Math.round(performance.now() - start),
    };
  }
}
