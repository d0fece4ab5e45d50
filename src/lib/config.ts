import { z } from 'zod';

const envBool = z
  .string()
  .optional()
  .transform((value) => value === '1' || value?.toLowerCase() === 'true');

const envSchema = z.object({
  OLLAMA_HOST: z.string().url().default('http://127.0.0.1:11434'),
  BRAIN_MODEL: z.string().min(1).default('deepseek-r1:7b'),
  CODER_MODEL: z.string().min(1).default('qwen2.5-coder:14b'),
  OUTPUT_DIR: z.string().min(1).default('outputs'),
  DEBUG_MODE: envBool,
  ANALYSIS_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  CONTEXT_WINDOW: z.coerce.number().int().positive().default(8192),
  MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  EVICT_SETTLE_MS: z.coerce.number().int().nonnegative().default(2000),
  REASONING_OPEN: z.string().min(1).default('<think>'),
  REASONING_CLOSE: z.string().min(1).default('</think>'),
  SOURCE_PREVIEW_CHARS: z.coerce.number().int().positive().default(2000),
  PORT: z.coerce.number().int().positive().default(3001),
  ALLOWED_ORIGINS: z.string().optional(),
});

export interface ModelsConfig {
  /** Reasoning model used for data extraction */
  brain: string;
  /** Coding model used for page generation */
  coder: string;
}

export interface AppConfig {
  ollamaHost: string;
  models: ModelsConfig;
  outputDir: string;
  debugMode: boolean;
  analysisTemperature: number;
  generationTemperature: number;
  contextWindow: number;
  maxTokens: number;
  evictSettleMs: number;
  reasoningDelimiters: { open: string; close: string };
  sourcePreviewChars: number;
  port: number;
  /** Comma-separated CORS origins for the HTTP server */
  allowedOrigins?: string;
}

/**
 * Builds the application config from environment variables.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${formatted}`);
  }

  const data = parsed.data;
  return {
    ollamaHost: data.OLLAMA_HOST,
    models: { brain: data.BRAIN_MODEL, coder: data.CODER_MODEL },
    outputDir: data.OUTPUT_DIR,
    debugMode: data.DEBUG_MODE,
    analysisTemperature: data.ANALYSIS_TEMPERATURE,
    generationTemperature: data.GENERATION_TEMPERATURE,
    contextWindow: data.CONTEXT_WINDOW,
    maxTokens: data.MAX_TOKENS,
    evictSettleMs: data.EVICT_SETTLE_MS,
    reasoningDelimiters: { open: data.REASONING_OPEN, close: data.REASONING_CLOSE },
    sourcePreviewChars: data.SOURCE_PREVIEW_CHARS,
    port: data.PORT,
    allowedOrigins: data.ALLOWED_ORIGINS,
  };
}

export function withModels(config: AppConfig, models: Partial<ModelsConfig>): AppConfig {
  return {
    ...config,
    models: {
      brain: models.brain ?? config.models.brain,
      coder: models.coder ?? config.models.coder,
    },
  };
}
