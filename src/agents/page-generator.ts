/**
 * Page Generator
 *
 * Renders a StructuredRecord into a single-file portfolio page with the coding
 * model, then patches the result so it stays visible when the animation
 * library fails to initialize. No degraded mode: without usable markup the
 * stage fails.
 */

import { createComponentLogger } from '../lib/logger.js';
import { GenerationError } from '../lib/errors.js';
import { extractMarkup } from '../lib/response-extractor.js';
import type { ModelGateway } from '../lib/model-gateway.js';
import {
  REVEAL_MARKER,
  REVEAL_SCRIPT_PATCH,
  REVEAL_STYLE_PATCH,
  buildGenerationPrompt,
} from './page-prompts.js';
import type { ModelOptions, ModelResult, StructuredRecord } from './types.js';

const log = createComponentLogger('generator');

export interface PageGeneratorOptions {
  model: string;
  temperature?: number;
  contextWindow?: number;
  maxTokens?: number;
  /** How much of the source text the prompt carries for cross-checking */
  sourcePreviewChars?: number;
  debug?: boolean;
}

function insertBefore(html: string, index: number, snippet: string): string {
  return `${html.slice(0, index)}${snippet}\n${html.slice(index)}`;
}

function lastMatchIndex(text: string, pattern: RegExp): number {
  let last = -1;
  for (const match of text.matchAll(pattern)) {
    last = match.index ?? last;
  }
  return last;
}

/**
 * Injects the reveal style before `</head>` and the reveal script before the
 * last `</body>`. Markup that already carries the marker is returned as-is, so
 * repeated calls never stack patches.
 */
export function applyFixes(html: string): string {
  if (html.toLowerCase().includes(REVEAL_MARKER)) {
    return html;
  }

  let patched = html;
  let tail = REVEAL_SCRIPT_PATCH;

  // Search the original string: lowercasing can change its length (e.g. 'İ')
  const headClose = patched.search(/<\/head>/i);
  if (headClose >= 0) {
    patched = insertBefore(patched, headClose, REVEAL_STYLE_PATCH);
  } else {
    tail = `${REVEAL_STYLE_PATCH}\n${REVEAL_SCRIPT_PATCH}`;
  }

  const bodyClose = lastMatchIndex(patched, /<\/body>/gi);
  if (bodyClose >= 0) {
    patched = insertBefore(patched, bodyClose, tail);
  } else {
    patched = `${patched}\n${tail}\n`;
  }

  return patched;
}

export class PageGenerator {
  private readonly model: string;
  private readonly modelOptions: ModelOptions;
  private readonly sourcePreviewChars: number;
  private readonly debug: boolean;

  constructor(private readonly gateway: ModelGateway, options: PageGeneratorOptions) {
    this.model = options.model;
    this.modelOptions = {
      temperature: options.temperature ?? 0.2,
      contextWindow: options.contextWindow ?? 8192,
      maxTokens: options.maxTokens ?? 4096,
    };
    this.sourcePreviewChars = options.sourcePreviewChars ?? 2000;
    this.debug = options.debug ?? false;
  }

  get modelName(): string {
    return this.model;
  }

  async generate(record: StructuredRecord, sourceText = ''): Promise<string> {
    log.info({ model: this.model }, 'Generating portfolio page');

    const prompt = buildGenerationPrompt(record, sourceText || record.source_text, this.sourcePreviewChars);
    if (this.debug) {
      log.debug({ prompt_chars: prompt.length, degraded: record.raw_analysis !== null }, 'Generation prompt built');
    }

    const result = await this.converseAndEvict(prompt);
    if (!result.success) {
      throw new GenerationError(`Model request failed: ${result.error}`);
    }

    let html = extractMarkup(result.content);
    if (!html) {
      throw new GenerationError('Model returned an empty document');
    }

    if (!html.toLowerCase().includes(REVEAL_MARKER)) {
      log.warn('Reveal fallback missing from output; injecting compatibility patches');
      html = this.applyFixes(html);
    }

    if (!html.toLowerCase().startsWith('<!doctype')) {
      log.warn('Output does not start with a doctype and may not be valid HTML');
    }

    log.info({ chars: html.length }, 'Portfolio page generated');
    return html;
  }

  applyFixes(html: string): string {
    return applyFixes(html);
  }

  private async converseAndEvict(prompt: string): Promise<ModelResult> {
    try {
      return await this.gateway.converse(
        [{ role: 'user', content: prompt }],
        this.model,
        this.modelOptions,
      );
    } finally {
      await this.gateway.evict(this.model);
    }
  }
}
