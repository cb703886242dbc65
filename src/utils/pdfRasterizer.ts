import * as mupdf from 'mupdf';
import type { PageImage } from '../types';
import { DecodeError, EncodeError } from './errors';
import { createLogger } from './logger';

export const DEFAULT_DPI = 150;

// PDF user space is 72 units per inch
const POINTS_PER_INCH = 72;
// Readers accept the header anywhere in the first 1024 bytes
const HEADER_SEARCH_WINDOW = 1024;

const log = createLogger('rasterizer');

export type PageEncoder = (pixmap: mupdf.Pixmap, pageIndex: number) => Uint8Array;

export interface RenderOptions {
  password?: string;
  /** Stop after this many pages */
  maxPages?: number;
  /** Turns a rendered page into image bytes; PNG by default */
  encode?: PageEncoder;
}

const encodePng: PageEncoder = pixmap => pixmap.asPNG();

/**
 * Callers pass whatever DPI they were given; unset or non-positive values
 * fall back to DEFAULT_DPI here rather than inside renderPdf.
 */
export function resolveDpi(dpi: number | undefined | null): number {
  if (dpi === undefined || dpi === null || !Number.isFinite(dpi) || dpi <= 0) {
    return DEFAULT_DPI;
  }
  return dpi;
}

function hasPdfHeader(bytes: Uint8Array): boolean {
  const window = bytes.subarray(0, HEADER_SEARCH_WINDOW);
  return Buffer.from(window.buffer, window.byteOffset, window.byteLength).includes('%PDF-');
}

function openPdf(bytes: Uint8Array, password?: string): mupdf.Document {
  if (!hasPdfHeader(bytes)) {
    throw new DecodeError('Input is not a PDF: missing %PDF- header');
  }

  let doc: mupdf.Document;
  try {
    doc = mupdf.Document.openDocument(bytes, 'application/pdf');
  } catch (error) {
    throw new DecodeError(`Failed to open PDF: ${errorMessage(error)}`, 'PDF_DECODE_FAILED', { cause: error });
  }

  if (doc.needsPassword()) {
    if (!password) {
      doc.destroy();
      throw new DecodeError('PDF is password protected', 'PDF_PASSWORD_REQUIRED');
    }
    const authenticated = doc.authenticatePassword(password);
    if (!authenticated) {
      doc.destroy();
      throw new DecodeError('PDF password is incorrect', 'PDF_PASSWORD_INCORRECT');
    }
  }

  return doc;
}

function countPages(doc: mupdf.Document): number {
  let pageCount: number;
  try {
    pageCount = doc.countPages();
  } catch (error) {
    throw new DecodeError(`Failed to read page tree: ${errorMessage(error)}`, 'PDF_DECODE_FAILED', { cause: error });
  }
  if (pageCount <= 0) {
    throw new DecodeError('PDF has no pages');
  }
  return pageCount;
}

function rasterizePage(doc: mupdf.Document, pageIndex: number, scale: number): mupdf.Pixmap {
  let page: mupdf.Page | null = null;
  try {
    page = doc.loadPage(pageIndex);
    return page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false);
  } catch (error) {
    throw new DecodeError(`Failed to render page ${pageIndex + 1}: ${errorMessage(error)}`, 'PDF_DECODE_FAILED', {
      cause: error,
    });
  } finally {
    page?.destroy();
  }
}

function renderPage(doc: mupdf.Document, pageIndex: number, scale: number, encode: PageEncoder): PageImage {
  const pixmap = rasterizePage(doc, pageIndex, scale);
  try {
    let data: Uint8Array;
    try {
      data = encode(pixmap, pageIndex);
    } catch (error) {
      throw new EncodeError(`Failed to encode page ${pageIndex + 1} as PNG: ${errorMessage(error)}`, pageIndex, {
        cause: error,
      });
    }
    if (data.length === 0) {
      throw new EncodeError(`Encoding page ${pageIndex + 1} produced no data`, pageIndex);
    }

    return {
      pageIndex,
      mimeType: 'image/png',
      data,
      width: pixmap.getWidth(),
      height: pixmap.getHeight(),
    };
  } finally {
    pixmap.destroy();
  }
}

/**
 * Render every page of a PDF to PNG at the given resolution, in page order.
 * Any page failure aborts the whole call.
 */
export function renderPdf(pdfBytes: Uint8Array, dpi: number, options: RenderOptions = {}): readonly PageImage[] {
  if (!Number.isFinite(dpi) || dpi <= 0) {
    throw new RangeError(`dpi must be a positive number, got ${dpi}`);
  }

  const doc = openPdf(pdfBytes, options.password);
  try {
    const totalPages = countPages(doc);
    const pageLimit = options.maxPages !== undefined ? Math.min(totalPages, options.maxPages) : totalPages;
    const scale = dpi / POINTS_PER_INCH;
    const encode = options.encode ?? encodePng;

    const images: PageImage[] = [];
    for (let i = 0; i < pageLimit; i++) {
      images.push(Object.freeze(renderPage(doc, i, scale, encode)));
    }

    log.debug('pdf_rendered', { pages: images.length, totalPages, dpi });
    return Object.freeze(images);
  } finally {
    doc.destroy();
  }
}

export function countPdfPages(pdfBytes: Uint8Array, password?: string): number {
  const doc = openPdf(pdfBytes, password);
  try {
    return countPages(doc);
  } finally {
    doc.destroy();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
