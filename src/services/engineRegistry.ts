import type {
  EngineInfo,
  RecognitionEngine,
  RecognitionOptions,
  RecognitionResult,
  StructuredRecognitionResult,
} from '../types';
import { NotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// Returned by suggest() when nothing is registered at all
export const FALLBACK_ENGINE_NAME = 'mock';

const log = createLogger('engine-registry');

/**
 * Named OCR engines plus a default. Populated during startup, then sealed
 * and only read while requests are served.
 */
export class EngineRegistry {
  private readonly engines = new Map<string, RecognitionEngine>();
  private defaultEngine = '';
  private sealed = false;

  register(name: string, engine: RecognitionEngine): this {
    this.assertWritable();
    if (!name) {
      throw new TypeError('Engine name must not be empty');
    }
    this.engines.set(name, engine);
    if (!this.defaultEngine) {
      this.defaultEngine = name;
    }
    return this;
  }

  setDefault(name: string): this {
    this.assertWritable();
    if (!this.engines.has(name)) {
      throw new NotFoundError('engine', name);
    }
    this.defaultEngine = name;
    return this;
  }

  /** Freeze the registry; later register/setDefault calls throw. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get defaultName(): string {
    return this.defaultEngine;
  }

  /** An empty name resolves to the default engine. */
  get(name = ''): RecognitionEngine {
    const resolved = name || this.defaultEngine;
    const engine = resolved ? this.engines.get(resolved) : undefined;
    if (!engine) {
      throw new NotFoundError('engine', resolved || '(default)');
    }
    return engine;
  }

  has(name: string): boolean {
    return this.engines.has(name);
  }

  names(): string[] {
    return [...this.engines.keys()].sort();
  }

  list(): Record<string, EngineInfo> {
    const info: Record<string, EngineInfo> = {};
    for (const name of this.names()) {
      info[name] = this.get(name).info();
    }
    return info;
  }

  /**
   * Recommend an engine. Remote engines win whenever one is registered;
   * otherwise the default, then any registered engine, then the fallback
   * name. Never throws. Ties are broken by name so the answer does not
   * depend on registration order.
   */
  suggest(_documentType: string, _sizeHint: number): string {
    const names = this.names();
    const remote = names.find(name => !this.get(name).info().isLocal);
    if (remote) return remote;
    if (this.defaultEngine) return this.defaultEngine;
    return names[0] ?? FALLBACK_ENGINE_NAME;
  }

  async extractTextWithBestEngine(
    image: Uint8Array,
    documentType: string,
    options?: RecognitionOptions
  ): Promise<RecognitionResult> {
    const engineName = this.suggest(documentType, image.length);
    const engine = this.get(engineName);
    log.info('engine_selected', { engine: engineName, documentType, imageSize: image.length });
    return engine.extractText(image, options);
  }

  async extractStructuredTextWithBestEngine(
    image: Uint8Array,
    documentType: string,
    options?: RecognitionOptions
  ): Promise<StructuredRecognitionResult> {
    const engineName = this.suggest(documentType, image.length);
    const engine = this.get(engineName);
    log.info('engine_selected', { engine: engineName, documentType, imageSize: image.length, structured: true });
    return engine.extractStructuredText(image, documentType, options);
  }

  async disposeAll(): Promise<void> {
    for (const engine of this.engines.values()) {
      await engine.dispose?.();
    }
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new Error('ENGINE_REGISTRY_SEALED');
    }
  }
}

export interface EngineRegistryInit {
  engines: Array<[name: string, engine: RecognitionEngine]>;
  defaultEngine?: string;
}

/**
 * Build a fully populated, sealed registry to hand to the converter.
 */
export function createEngineRegistry({ engines, defaultEngine }: EngineRegistryInit): EngineRegistry {
  const registry = new EngineRegistry();
  for (const [name, engine] of engines) {
    registry.register(name, engine);
  }
  if (defaultEngine) {
    registry.setDefault(defaultEngine);
  }
  return registry.seal();
}
