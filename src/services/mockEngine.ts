import type {
  EngineInfo,
  RecognitionEngine,
  RecognitionOptions,
  RecognitionResult,
  StructuredRecognitionResult,
} from '../types';
import { throwIfAborted } from '../utils/clock';

export const MOCK_ENGINE_NAME = 'mock';

export const MOCK_IMAGE_TEXT =
  'This is mock OCR text extracted from the image. In a real implementation, this would be the actual text content from the PDF page.';

export const MOCK_PDF_TEXT = `# Mock PDF Conversion

This is a mock conversion of a PDF document for testing purposes.

## Content

The PDF contained text that has been extracted and converted to Markdown format.

- Item 1
- Item 2
- Item 3

Mock processing complete.`;

const IMAGE_CONFIDENCE = 0.85;
const PDF_CONFIDENCE = 0.8;
const PDF_PROCESSING_TIME_MS = 100;

/**
 * Deterministic stand-in engine for tests and offline use.
 */
export class MockEngine implements RecognitionEngine {
  private readonly languages: string[];

  constructor(languages: string[] = []) {
    this.languages = languages.length > 0 ? [...languages] : ['eng'];
  }

  async extractText(_image: Uint8Array, options: RecognitionOptions = {}): Promise<RecognitionResult> {
    throwIfAborted(options.signal);
    const start = performance.now();
    return {
      text: MOCK_IMAGE_TEXT,
      confidence: IMAGE_CONFIDENCE,
      language: this.languages.join(','),
      engine: MOCK_ENGINE_NAME,
      processingTimeMs: Math.round(performance.now() - start),
    };
  }

  async extractStructuredText(
    image: Uint8Array,
    _documentTypeHint: string,
    options: RecognitionOptions = {}
  ): Promise<StructuredRecognitionResult> {
    const basic = await this.extractText(image, options);
    return {
      ...basic,
      blocks: [
        {
          text: 'Mock Title',
          confidence: 0.9,
          boundingBox: { x: 50, y: 50, width: 300, height: 30 },
          blockType: 'title',
        },
        {
          text: 'Mock paragraph content with multiple lines of text that would be extracted from the document.',
          confidence: 0.85,
          boundingBox: { x: 50, y: 100, width: 400, height: 60 },
          blockType: 'paragraph',
        },
      ],
      tables: [],
      layout: {
        pageWidth: 600,
        pageHeight: 800,
        orientation: 'portrait',
        columnCount: 1,
        hasTables: false,
        hasDiagrams: false,
      },
    };
  }

  async processPdf(_pdf: Uint8Array, options: RecognitionOptions = {}): Promise<RecognitionResult> {
    throwIfAborted(options.signal);
    return {
      text: MOCK_PDF_TEXT,
      confidence: PDF_CONFIDENCE,
      language: 'en',
      engine: MOCK_ENGINE_NAME,
      processingTimeMs: PDF_PROCESSING_TIME_MS,
    };
  }

  info(): EngineInfo {
    return {
      name: 'Mock OCR',
      version: '1.0',
      supportedLanguages: [...this.languages],
      features: ['text_extraction', 'basic_layout', 'testing'],
      isLocal: true,
      requiresAuth: false,
    };
  }
}
