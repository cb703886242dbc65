export interface PageImage {
  /** Zero-based page index in document order */
  pageIndex: number;
  mimeType: 'image/png';
  data: Uint8Array;
  width: number;
  height: number;
}

export interface RecognitionResult {
  text: string;
  confidence: number; // 0-1
  language: string;
  engine: string;
  processingTimeMs: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type TextBlockType = 'paragraph' | 'heading' | 'table_row' | 'math' | 'title' | 'line' | 'word';

export interface TextBlock {
  text: string;
  confidence: number;
  boundingBox: BoundingBox;
  blockType: TextBlockType;
}

export interface TableCell {
  text: string;
  boundingBox: BoundingBox;
  rowIndex: number;
  columnIndex: number;
  columnSpan: number;
  rowSpan: number;
}

export interface TableRow {
  cells: TableCell[];
}

export interface Table {
  rows: TableRow[];
  boundingBox: BoundingBox;
  confidence: number;
}

export interface LayoutInfo {
  pageWidth: number;
  pageHeight: number;
  orientation: 'portrait' | 'landscape';
  columnCount: number;
  hasTables: boolean;
  hasDiagrams: boolean;
}

export interface StructuredRecognitionResult extends RecognitionResult {
  blocks: TextBlock[];
  tables: Table[];
  layout: LayoutInfo;
}

export interface EngineInfo {
  name: string;
  version: string;
  supportedLanguages: readonly string[];
  features: readonly string[];
  isLocal: boolean;
  requiresAuth: boolean;
}

export interface RecognitionOptions {
  signal?: AbortSignal;
}

/**
 * Capability shared by every OCR backend. Implementations are independent
 * classes; the orchestrator only ever talks to this interface.
 */
export interface RecognitionEngine {
  extractText(image: Uint8Array, options?: RecognitionOptions): Promise<RecognitionResult>;
  /** `documentTypeHint` is advisory and never changes what is recognized. */
  extractStructuredText(
    image: Uint8Array,
    documentTypeHint: string,
    options?: RecognitionOptions
  ): Promise<StructuredRecognitionResult>;
  processPdf(pdf: Uint8Array, options?: RecognitionOptions): Promise<RecognitionResult>;
  info(): EngineInfo;
  dispose?(): Promise<void>;
}

// Remote job lifecycle: submitted -> processing -> completed | failed | timed_out
export type RemoteJobState =
  | { status: 'submitted'; jobId: string }
  | { status: 'processing'; jobId: string; polls: number }
  | { status: 'completed'; jobId: string; polls: number; text: string }
  | { status: 'failed'; jobId: string | null; polls: number; reason: string }
  | { status: 'timed_out'; jobId: string; polls: number; elapsedMs: number };

export type RemoteJobStatus = RemoteJobState['status'];

export interface DocumentSummary {
  id: string;
  name: string;
  size: number;
  modifiedTime: string;
  mimeType: string;
}

export interface CombinedResult {
  documentId: string;
  recognizedText: string;
  engineUsed: string;
  confidence: number;
  processingTimeMs: number;
  /** One image per page, in page order */
  pageImages: readonly PageImage[];
}

export type DocumentType = 'handwritten' | 'typed' | 'mixed' | 'research';

export interface ConversionSuggestion {
  recommendedType: DocumentType;
  confidence: number;
  reasoning: string;
  alternativeTypes: DocumentType[];
}

export type ToolContent =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: 'image/png' };
