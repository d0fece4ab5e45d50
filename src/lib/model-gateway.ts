import { Ollama } from 'ollama';
import type { ChatRequest, GenerateRequest } from 'ollama';
import { createComponentLogger } from './logger.js';
import { errorMessage } from './errors.js';
import { sleep } from './sleep.js';
import type { ChatMessage, ModelOptions, ModelResult } from '../agents/types.js';

// ─── Gateway contract ────────────────────────────────────────────────

export const DEFAULT_MODEL_OPTIONS: ModelOptions = {
  temperature: 0.3,
  contextWindow: 8192,
  maxTokens: 4096,
};

/**
 * Access to the local model runtime. `generate` and `converse` never throw:
 * runtime faults come back as `{ success: false, error }`.
 */
export interface ModelGateway {
  generate(prompt: string, model: string, options?: Partial<ModelOptions>): Promise<ModelResult>;
  converse(messages: ChatMessage[], model: string, options?: Partial<ModelOptions>): Promise<ModelResult>;
  /** Unload `model` from device memory now. Resolves false if the runtime refused. */
  evict(model: string): Promise<boolean>;
  isAvailable(): Promise<boolean>;
}

// ─── Ollama implementation ───────────────────────────────────────────

/**
 * The slice of the ollama client this gateway calls. Non-streaming only;
 * tests pass a plain object in its place.
 */
export interface RuntimeClient {
  generate(request: GenerateRequest & { stream?: false }): Promise<{ response: string }>;
  chat(request: ChatRequest & { stream?: false }): Promise<{ message: { content: string } }>;
  list(): Promise<unknown>;
}

export interface OllamaGatewayConfig {
  host?: string;
  /** Wait after an eviction so the runtime can reclaim memory before the next load */
  settleMs?: number;
  client?: RuntimeClient;
}

const log = createComponentLogger('gateway');

function toRuntimeOptions(options?: Partial<ModelOptions>) {
  const resolved = { ...DEFAULT_MODEL_OPTIONS, ...options };
  return {
    temperature: resolved.temperature,
    num_ctx: resolved.contextWindow,
    num_predict: resolved.maxTokens,
  };
}

export class OllamaGateway implements ModelGateway {
  private readonly client: RuntimeClient;
  private readonly settleMs: number;

  constructor(config: OllamaGatewayConfig = {}) {
    this.client = config.client ?? new Ollama({ host: config.host });
    this.settleMs = config.settleMs ?? 2000;
  }

  async generate(prompt: string, model: string, options?: Partial<ModelOptions>): Promise<ModelResult> {
    try {
      const response = await this.client.generate({
        model,
        prompt,
        stream: false,
        options: toRuntimeOptions(options),
      });
      return { success: true, content: response.response ?? '', model };
    } catch (err) {
      const error = errorMessage(err);
      log.error({ model, error }, 'Generation failed');
      return { success: false, error, model };
    }
  }

  async converse(messages: ChatMessage[], model: string, options?: Partial<ModelOptions>): Promise<ModelResult> {
    try {
      const response = await this.client.chat({
        model,
        messages,
        stream: false,
        options: toRuntimeOptions(options),
      });
      return { success: true, content: response.message?.content ?? '', model };
    } catch (err) {
      const error = errorMessage(err);
      log.error({ model, error }, 'Chat failed');
      return { success: false, error, model };
    }
  }

  async evict(model: string): Promise<boolean> {
    log.info({ model }, 'Evicting model from memory');
    try {
      // keep_alive 0 tells the runtime to unload immediately instead of idling
      await this.client.generate({ model, prompt: '', stream: false, keep_alive: 0 });
    } catch (err) {
      log.warn({ model, error: errorMessage(err) }, 'Model eviction failed (it may not have been loaded)');
      return false;
    }
    if (this.settleMs > 0) {
      await sleep(this.settleMs);
    }
    log.info({ model }, 'Model evicted');
    return true;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }
}
