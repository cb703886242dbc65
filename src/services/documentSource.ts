import { readdir, readFile, stat } from 'fs/promises';
import { basename, join, resolve } from 'path';
import type { DocumentSummary } from '../types';
import { throwIfAborted } from '../utils/clock';
import { NotFoundError } from '../utils/errors';

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Where PDF bytes come from. The converter only needs these two calls;
 * authentication and paging belong to the implementation.
 */
export interface DocumentSource {
  /** Rejects with NotFoundError for unknown ids. */
  fetch(documentId: string, signal?: AbortSignal): Promise<Uint8Array>;
  search(query: string, maxResults?: number): Promise<DocumentSummary[]>;
}

/**
 * PDFs in a single local directory; a document id is the file name.
 */
export class FileSystemDocumentSource implements DocumentSource {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async fetch(documentId: string, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    const path = this.resolveId(documentId);
    try {
      return await readFile(path, { signal });
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError('document', documentId);
      }
      throw error;
    }
  }

  async search(query: string, maxResults = DEFAULT_SEARCH_LIMIT): Promise<DocumentSummary[]> {
    const limit = maxResults > 0 ? maxResults : DEFAULT_SEARCH_LIMIT;
    const needle = query.trim().toLowerCase();

    const entries = await readdir(this.rootDir, { withFileTypes: true });
    const matches = entries.filter(
      entry => entry.isFile() && /\.pdf$/i.test(entry.name) && entry.name.toLowerCase().includes(needle)
    );

    const summaries = await Promise.all(
      matches.map(async (entry): Promise<DocumentSummary> => {
        const info = await stat(join(this.rootDir, entry.name));
        return {
          id: entry.name,
          name: entry.name,
          size: info.size,
          modifiedTime: info.mtime.toISOString(),
          mimeType: 'application/pdf',
        };
      })
    );

    return summaries
      .sort((a, b) => b.modifiedTime.localeCompare(a.modifiedTime) || a.name.localeCompare(b.name))
      .slice(0, limit);
  }

  async describe(documentId: string): Promise<DocumentSummary> {
    const path = this.resolveId(documentId);
    try {
      const info = await stat(path);
      return {
        id: documentId,
        name: documentId,
        size: info.size,
        modifiedTime: info.mtime.toISOString(),
        mimeType: 'application/pdf',
      };
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError('document', documentId);
      }
      throw error;
    }
  }

  // Ids are bare file names; anything with a path component is unknown
  private resolveId(documentId: string): string {
    if (!documentId || basename(documentId) !== documentId || documentId === '.' || documentId === '..') {
      throw new NotFoundError('document', documentId);
    }
    return join(this.rootDir, documentId);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR' || error.code === 'ENOTDIR')
  );
}
