import type {
  EngineInfo,
  RecognitionEngine,
  RecognitionOptions,
  RecognitionResult,
  StructuredRecognitionResult,
} from '../types';
import { markdownToStructure } from '../utils/layoutBlocks';
import { createLogger } from '../utils/logger';
import { MathpixClient, type JobDocument, type MathpixClientOptions } from './mathpixClient';

export const MATHPIX_ENGINE_NAME = 'mathpix';

// Mathpix does not report a score; its output is consistently high quality
const MATHPIX_CONFIDENCE = 0.95;

const log = createLogger('mathpix-engine');

export interface MathpixEngineOptions extends MathpixClientOptions {
  languages?: string[];
}

export class MathpixEngine implements RecognitionEngine {
  private readonly client: MathpixClient;
  private readonly languages: string[];
  private readonly engineInfo: EngineInfo;

  constructor(options: MathpixEngineOptions) {
    this.client = new MathpixClient(options);
    this.languages = options.languages && options.languages.length > 0 ? [...options.languages] : ['en'];
    this.engineInfo = Object.freeze({
      name: 'Mathpix',
      version: 'v3',
      supportedLanguages: Object.freeze([...this.languages]),
      features: Object.freeze(['text_extraction', 'math_recognition', 'table_extraction', 'high_accuracy']),
      isLocal: false,
      requiresAuth: true,
    });
  }

  async extractText(image: Uint8Array, options: RecognitionOptions = {}): Promise<RecognitionResult> {
    return this.recognize({ data: image, fileName: 'image.png', mimeType: 'image/png' }, options);
  }

  async extractStructuredText(
    image: Uint8Array,
    documentTypeHint: string,
    options: RecognitionOptions = {}
  ): Promise<StructuredRecognitionResult> {
    log.debug('structured_extraction', { documentTypeHint });
    const basic = await this.extractText(image, options);
    const structure = markdownToStructure(basic.text, MATHPIX_CONFIDENCE);
    return { ...basic, ...structure };
  }

  async processPdf(pdf: Uint8Array, options: RecognitionOptions = {}): Promise<RecognitionResult> {
    return this.recognize({ data: pdf, fileName: 'document.pdf', mimeType: 'application/pdf' }, options);
  }

  info(): EngineInfo {
    return this.engineInfo;
  }

  private async recognize(document: JobDocument, options: RecognitionOptions): Promise<RecognitionResult> {
    const start = performance.now();
    const text = await this.client.run(document, { signal: options.signal });
    return {
      text,
      confidence: MATHPIX_CONFIDENCE,
      language: this.languages.join(','),
      engine: MATHPIX_ENGINE_NAME,
      processingTimeMs: Math.round(performance.now() - start),
    };
  }
}
