import dotenv from 'dotenv';
import { z } from 'zod';
import { createEngineRegistry, type EngineRegistry } from './services/engineRegistry';
import {
  MATHPIX_PDF_API_URL,
  MATHPIX_POLL_INTERVAL_MS,
  MATHPIX_TIMEOUT_MS,
  type FetchFn,
} from './services/mathpixClient';
import { MATHPIX_ENGINE_NAME, MathpixEngine } from './services/mathpixEngine';
import { MOCK_ENGINE_NAME, MockEngine } from './services/mockEngine';
import { TESSERACT_ENGINE_NAME, TesseractEngine, type OcrWorkerFactory } from './services/tesseractEngine';
import type { RecognitionEngine } from './types';
import type { Clock } from './utils/clock';
import { ConfigError } from './utils/errors';
import type { LogLevel } from './utils/logger';
import { DEFAULT_DPI } from './utils/pdfRasterizer';

const emptyToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  MATHPIX_APP_ID: optionalString,
  MATHPIX_APP_KEY: optionalString,
  MATHPIX_API_URL: z.preprocess(emptyToUndefined, z.string().url().default(MATHPIX_PDF_API_URL)),
  MATHPIX_POLL_INTERVAL_MS: positiveInt(MATHPIX_POLL_INTERVAL_MS),
  MATHPIX_TIMEOUT_MS: positiveInt(MATHPIX_TIMEOUT_MS),
  OCR_LANGUAGES: z.preprocess(emptyToUndefined, z.string().default('en')),
  LOCAL_OCR_ENGINE: z.preprocess(emptyToUndefined, z.enum(['mock', 'tesseract']).default('mock')),
  TESSERACT_LANGUAGE: z.preprocess(emptyToUndefined, z.string().default('eng')),
  PDF_DOCUMENTS_DIR: z.preprocess(emptyToUndefined, z.string().default('.')),
  PDF_DPI: positiveInt(DEFAULT_DPI),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? emptyToUndefined(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
});

export interface MathpixCredentials {
  appId: string;
  appKey: string;
}

export interface AppConfig {
  mathpix: (MathpixCredentials & { apiUrl: string; pollIntervalMs: number; timeoutMs: number }) | null;
  languages: string[];
  localEngine: 'mock' | 'tesseract';
  tesseractLanguage: string;
  documentsDir: string;
  dpi: number;
  logLevel: LogLevel;
}

/**
 * Validate configuration from the environment. With no argument, `.env` is
 * loaded into process.env first.
 */
export function loadConfig(env?: Record<string, string | undefined>): AppConfig {
  if (!env) {
    dotenv.config();
  }
  const parsed = envSchema.safeParse(env ?? process.env);

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    throw new ConfigError(`Missing or invalid environment variables: ${variables.join(', ')}`, variables);
  }

  const data = parsed.data;
  if (Boolean(data.MATHPIX_APP_ID) !== Boolean(data.MATHPIX_APP_KEY)) {
    throw new ConfigError('MATHPIX_APP_ID and MATHPIX_APP_KEY must be set together', [
      data.MATHPIX_APP_ID ? 'MATHPIX_APP_KEY' : 'MATHPIX_APP_ID',
    ]);
  }

  const languages = data.OCR_LANGUAGES.split(',')
    .map(lang => lang.trim())
    .filter(lang => lang.length > 0);

  return {
    mathpix:
      data.MATHPIX_APP_ID && data.MATHPIX_APP_KEY
        ? {
            appId: data.MATHPIX_APP_ID,
            appKey: data.MATHPIX_APP_KEY,
            apiUrl: data.MATHPIX_API_URL,
            pollIntervalMs: data.MATHPIX_POLL_INTERVAL_MS,
            timeoutMs: data.MATHPIX_TIMEOUT_MS,
          }
        : null,
    languages: languages.length > 0 ? languages : ['en'],
    localEngine: data.LOCAL_OCR_ENGINE,
    tesseractLanguage: data.TESSERACT_LANGUAGE,
    documentsDir: data.PDF_DOCUMENTS_DIR,
    dpi: data.PDF_DPI,
    logLevel: data.LOG_LEVEL,
  };
}

export interface EngineDependencies {
  fetch?: FetchFn;
  clock?: Clock;
  createWorker?: OcrWorkerFactory;
}

/**
 * Register the local engine and, when credentials exist, Mathpix as the
 * default. The returned registry is sealed.
 */
export function buildEngineRegistry(config: AppConfig, deps: EngineDependencies = {}): EngineRegistry {
  const engines: Array<[string, RecognitionEngine]> = [];

  if (config.localEngine === 'tesseract') {
    engines.push([
      TESSERACT_ENGINE_NAME,
      new TesseractEngine({ language: config.tesseractLanguage, createWorker: deps.createWorker }),
    ]);
  } else {
    engines.push([MOCK_ENGINE_NAME, new MockEngine(config.languages)]);
  }

  if (config.mathpix) {
    engines.push([
      MATHPIX_ENGINE_NAME,
      new MathpixEngine({
        ...config.mathpix,
        languages: config.languages,
        fetch: deps.fetch,
        clock: deps.clock,
      }),
    ]);
  }

  return createEngineRegistry({
    engines,
    defaultEngine: config.mathpix ? MATHPIX_ENGINE_NAME : undefined,
  });
}
