import { z } from 'zod';
import type { RemoteJobState } from '../types';
import { systemClock, linkAbortSignals, throwIfAborted, type Clock } from '../utils/clock';
import { CancelledError, JobFailedError, JobTimedOutError, SubmissionError } from '../utils/errors';
import { createLogger } from '../utils/logger';

export const MATHPIX_PDF_API_URL = 'https://api.mathpix.com/v3/pdf';
export const MATHPIX_POLL_INTERVAL_MS = 5_000;
export const MATHPIX_TIMEOUT_MS = 5 * 60_000;
export const MATHPIX_SUBMIT_TIMEOUT_MS = 60_000;

const DEFAULT_CONVERSION_OPTIONS = { conversion_formats: { md: true } };

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface MathpixClientOptions {
  appId: string;
  appKey: string;
  apiUrl?: string;
  pollIntervalMs?: number;
  /** Absolute budget from accepted submission to fetched result */
  timeoutMs?: number;
  submitTimeoutMs?: number;
  conversionOptions?: Record<string, unknown>;
  fetch?: FetchFn;
  clock?: Clock;
}

export interface JobDocument {
  data: Uint8Array;
  fileName: string;
  mimeType: string;
}

export interface RunJobOptions {
  signal?: AbortSignal;
  onStateChange?: (state: RemoteJobState) => void;
}

const uploadResponseSchema = z.object({
  pdf_id: z.string().min(1).optional(),
  job_id: z.string().min(1).optional(),
  error: z.string().optional(),
  error_info: z
    .object({
      id: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

const pollResponseSchema = z.object({
  status: z.string(),
});

const log = createLogger('mathpix');

class DeadlineReached extends Error {
  constructor() {
    super('job deadline reached');
  }
}

/**
 * Client for the Mathpix PDF job API: upload, poll status on a fixed
 * interval, then fetch the markdown result.
 */
export class MathpixClient {
  private readonly apiUrl: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly submitTimeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly clock: Clock;

  constructor(private readonly options: MathpixClientOptions) {
    this.apiUrl = (options.apiUrl ?? MATHPIX_PDF_API_URL).replace(/\/+$/, '');
    this.pollIntervalMs = options.pollIntervalMs ?? MATHPIX_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? MATHPIX_TIMEOUT_MS;
    this.submitTimeoutMs = options.submitTimeoutMs ?? MATHPIX_SUBMIT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Drive one job to a terminal state. Resolves with the recognized text on
   * `completed`; every other terminal state rejects with its typed error.
   */
  async run(document: JobDocument, runOptions: RunJobOptions = {}): Promise<string> {
    const { signal, onStateChange } = runOptions;
    const report = (state: RemoteJobState) => {
      log.debug('job_state', { jobId: state.jobId, status: state.status });
      onStateChange?.(state);
    };

    let jobId: string;
    try {
      jobId = await this.submit(document, signal);
    } catch (error) {
      if (error instanceof SubmissionError) {
        report({ status: 'failed', jobId: null, polls: 0, reason: error.message });
      }
      throw error;
    }
    report({ status: 'submitted', jobId });

    const startedAt = this.clock.now();
    const deadline = startedAt + this.timeoutMs;
    let deadlineReached = false;
    const requestAbort = linkAbortSignals(signal);
    const cancelDeadline = this.clock.schedule(this.timeoutMs, () => {
      deadlineReached = true;
      requestAbort.abort(new DeadlineReached());
    });

    let polls = 0;
    const timedOut = () => {
      const elapsedMs = this.clock.now() - startedAt;
      report({ status: 'timed_out', jobId, polls, elapsedMs });
      log.warn('job_timed_out', { jobId, polls, elapsedMs });
      return new JobTimedOutError(jobId, polls, this.timeoutMs);
    };
    const failed = (error: JobFailedError) => {
      report({ status: 'failed', jobId, polls, reason: error.message });
      return error;
    };
    // Distinguishes our own deadline from caller cancellation after an aborted request
    const classify = (error: unknown, phase: 'poll' | 'fetch'): Error => {
      if (deadlineReached) return timedOut();
      if (signal?.aborted) return new CancelledError(signal.reason);
      if (error instanceof JobFailedError) return failed(error);
      return failed(new JobFailedError(`${phase} request failed: ${messageOf(error)}`, jobId, phase, { cause: error }));
    };

    try {
      for (;;) {
        const remaining = deadline - this.clock.now();
        if (remaining <= 0 || deadlineReached) throw timedOut();

        await this.clock.sleep(Math.min(this.pollIntervalMs, remaining), signal);
        if (deadlineReached || this.clock.now() >= deadline) throw timedOut();

        let status: string;
        try {
          status = await this.pollStatus(jobId, requestAbort.signal);
        } catch (error) {
          throw classify(error, 'poll');
        }
        polls++;

        if (status === 'completed') {
          let text: string;
          try {
            text = await this.fetchResult(jobId, requestAbort.signal);
          } catch (error) {
            throw classify(error, 'fetch');
          }
          report({ status: 'completed', jobId, polls, text });
          log.info('job_completed', { jobId, polls, elapsedMs: this.clock.now() - startedAt });
          return text;
        }

        if (status === 'error') {
          throw failed(
            new JobFailedError(`Mathpix reported an error for job ${jobId}`, jobId, 'poll', { rejected: true })
          );
        }

        if (status !== 'processing') {
          // The service reports intermediate states such as "received" or "split"
          log.warn('job_unknown_status', { jobId, status, polls });
        }
        report({ status: 'processing', jobId, polls });
      }
    } finally {
      cancelDeadline();
      requestAbort.dispose();
    }
  }

  /**
   * Upload the document and return the job id. Any rejection happens here,
   * before the job ever reaches processing.
   */
  async submit(document: JobDocument, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(document.data)], { type: document.mimeType }), document.fileName);
    form.append('options_json', JSON.stringify(this.options.conversionOptions ?? DEFAULT_CONVERSION_OPTIONS));

    const submitAbort = linkAbortSignals(signal);
    const cancelTimer = this.clock.schedule(this.submitTimeoutMs, () => submitAbort.abort(new DeadlineReached()));

    let response: Response;
    let body: string;
    try {
      response = await this.fetchFn(this.apiUrl, {
        method: 'POST',
        headers: this.authHeaders(),
        body: form,
        signal: submitAbort.signal,
      });
      body = await response.text();
    } catch (error) {
      if (signal?.aborted) throw new CancelledError(signal.reason);
      if (submitAbort.signal.aborted) {
        throw new SubmissionError(`Submission timed out after ${this.submitTimeoutMs}ms`, null, { cause: error });
      }
      throw new SubmissionError(`Submission request failed: ${messageOf(error)}`, null, { cause: error });
    } finally {
      cancelTimer();
      submitAbort.dispose();
    }

    if (!response.ok) {
      log.error('job_submit_rejected', { status: response.status, body: body.slice(0, 500) });
      throw new SubmissionError(`Mathpix rejected the upload with status ${response.status}: ${body}`, response.status);
    }

    const parsed = uploadResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new SubmissionError(`Unexpected upload response: ${body.slice(0, 200)}`, response.status);
    }

    const upload = parsed.data;
    if (upload.error) {
      const detail = upload.error_info?.message ? ` - ${upload.error_info.message}` : '';
      throw new SubmissionError(`Mathpix error: ${upload.error}${detail}`, response.status);
    }

    const jobId = upload.pdf_id ?? upload.job_id;
    if (!jobId) {
      throw new SubmissionError('Upload response did not include a job id', response.status);
    }

    log.info('job_submitted', { jobId, fileName: document.fileName, bytes: document.data.length });
    return jobId;
  }

  private async pollStatus(jobId: string, signal: AbortSignal): Promise<string> {
    const response = await this.fetchFn(`${this.apiUrl}/${encodeURIComponent(jobId)}`, {
      method: 'GET',
      headers: this.authHeaders(),
      signal,
    });
    const body = await response.text();

    if (!response.ok) {
      throw new JobFailedError(`Status request failed with status ${response.status}`, jobId, 'poll');
    }

    const parsed = pollResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new JobFailedError(`Unexpected status response: ${body.slice(0, 200)}`, jobId, 'poll');
    }

    log.debug('job_polled', { jobId, status: parsed.data.status });
    return parsed.data.status;
  }

  private async fetchResult(jobId: string, signal: AbortSignal): Promise<string> {
    const response = await this.fetchFn(`${this.apiUrl}/${encodeURIComponent(jobId)}.md`, {
      method: 'GET',
      headers: this.authHeaders(),
      signal,
    });
    const body = await response.text();

    if (!response.ok) {
      throw new JobFailedError(`Result request failed with status ${response.status}`, jobId, 'fetch');
    }
    return body;
  }

  private authHeaders(): Record<string, string> {
    return {
      app_id: this.options.appId,
      app_key: this.options.appKey,
    };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
