import type { FetchFn } from '../../src/services/mathpixClient';
import type { DocumentSource } from '../../src/services/documentSource';
import type { DocumentSummary } from '../../src/types';
import { throwIfAborted, type Clock } from '../../src/utils/clock';
import { NotFoundError } from '../../src/utils/errors';

interface Timer {
  id: number;
  at: number;
  callback: () => void;
}

/**
 * Virtual time. sleep() advances the clock immediately and fires every
 * scheduled callback that falls due on the way.
 */
export class FakeClock implements Clock {
  private current = 0;
  private timers: Timer[] = [];
  private nextId = 1;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    this.sleeps.push(ms);
    this.advance(ms);
    throwIfAborted(signal);
  }

  schedule(ms: number, callback: () => void): () => void {
    const id = this.nextId++;
    this.timers.push({ id, at: this.current + ms, callback });
    return () => {
      this.timers = this.timers.filter(timer => timer.id !== id);
    };
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers.filter(timer => timer.at <= target).sort((a, b) => a.at - b.at)[0];
      if (!due) break;
      this.timers = this.timers.filter(timer => timer.id !== due.id);
      this.current = due.at;
      due.callback();
    }
    this.current = target;
  }

  get pendingTimers(): number {
    return this.timers.length;
  }
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: RequestInit['body'];
  signal: AbortSignal | null;
  /** Clock time when the request was issued */
  at: number;
}

export type FakeHandler = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * A fetch that records every request and answers from `handler`.
 */
export function createFakeFetch(handler: FakeHandler, clock?: Clock): { fetch: FetchFn; calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];
  const fetch: FetchFn = async (input, init = {}) => {
    const request: RecordedRequest = {
      url: input,
      method: init.method ?? 'GET',
      headers: new Headers(init.headers),
      body: init.body,
      signal: init.signal ?? null,
      at: clock ? clock.now() : 0,
    };
    calls.push(request);
    if (request.signal?.aborted) {
      throw request.signal.reason;
    }
    return handler(request);
  };
  return { fetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export const TEST_API_URL = 'https://ocr.test/v3/pdf';

/**
 * Routes requests the way the job API does: POST uploads, GET /{id} for
 * status, GET /{id}.md for the result. Statuses are served in order, the
 * last one repeating.
 */
export function jobApiHandler(options: {
  jobId?: string;
  statuses: string[];
  markdown?: string;
  onPoll?: (request: RecordedRequest) => void;
}): FakeHandler {
  const jobId = options.jobId ?? 'job-1';
  let pollIndex = 0;
  return request => {
    if (request.method === 'POST') {
      return jsonResponse({ pdf_id: jobId });
    }
    if (request.url.endsWith('.md')) {
      return new Response(options.markdown ?? '# Result', { status: 200 });
    }
    options.onPoll?.(request);
    const status = options.statuses[Math.min(pollIndex, options.statuses.length - 1)];
    pollIndex++;
    return jsonResponse({ status });
  };
}

export function countCalls(calls: RecordedRequest[], kind: 'submit' | 'poll' | 'fetch'): number {
  return calls.filter(call => {
    if (kind === 'submit') return call.method === 'POST';
    if (kind === 'fetch') return call.method === 'GET' && call.url.endsWith('.md');
    return call.method === 'GET' && !call.url.endsWith('.md');
  }).length;
}

/**
 * In-memory documents keyed by id.
 */
export class MemoryDocumentSource implements DocumentSource {
  readonly fetched: string[] = [];

  constructor(private readonly documents: Record<string, Uint8Array>) {}

  async fetch(documentId: string, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    this.fetched.push(documentId);
    const bytes = this.documents[documentId];
    if (!bytes) {
      throw new NotFoundError('document', documentId);
    }
    return bytes;
  }

  async search(query: string, maxResults = 10): Promise<DocumentSummary[]> {
    return Object.entries(this.documents)
      .filter(([id]) => id.toLowerCase().includes(query.toLowerCase()))
      .slice(0, maxResults)
      .map(([id, bytes]) => ({
        id,
        name: id,
        size: bytes.length,
        modifiedTime: new Date(0).toISOString(),
        mimeType: 'application/pdf',
      }));
  }
}
