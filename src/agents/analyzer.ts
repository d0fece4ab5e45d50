/**
 * Data Analyzer
 *
 * Turns raw CV text into a StructuredRecord with the reasoning ("brain") model.
 * Pure extraction: the prompt forbids inventing titles, dates or projects.
 * Falls back to a degraded record carrying the raw reply when no JSON parses.
 */

import { createComponentLogger } from '../lib/logger.js';
import { AnalysisError } from '../lib/errors.js';
import { extractStructured as defaultExtractStructured } from '../lib/response-extractor.js';
import type { StructuredPayload } from '../lib/response-extractor.js';
import type { ModelGateway } from '../lib/model-gateway.js';
import { buildDegradedRecord, buildRecord } from './record.js';
import type { ModelOptions, ModelResult, StructuredRecord } from './types.js';

const log = createComponentLogger('analyzer');

const OUTPUT_SCHEMA = `\`\`\`json
{
    "validation": {
        "source": "Extracted from provided CV text only",
        "hallucination_check": "All data verified against source text"
    },
    "personal": {
        "name": "EXACT full name from CV",
        "title": "EXACT job title from CV (e.g., 'Junior Game Developer' - no modifications)",
        "tagline": "Brief tagline based on actual CV content",
        "bio": "2-3 sentences using ONLY facts from CV",
        "email": "exact email or null",
        "phone": "exact phone or null",
        "location": "exact location or null"
    },
    "links": {
        "linkedin": "exact LinkedIn URL or null",
        "github": "exact GitHub URL or null",
        "website": "exact website URL or null",
        "other": ["any other URLs found"]
    },
    "experience": [
        {
            "company": "EXACT company name",
            "role": "EXACT job title from CV",
            "period": "EXACT date range from CV",
            "description": "Summary using ONLY CV content",
            "highlights": ["actual achievements from CV"]
        }
    ],
    "projects": [
        {
            "name": "EXACT project name",
            "description": "Description using ONLY CV content",
            "tech_stack": ["technologies mentioned in CV"],
            "link": "project URL if in CV, else null",
            "type": "Game/Web/App based on CV"
        }
    ],
    "education": [
        {
            "institution": "EXACT school name",
            "degree": "EXACT degree/program name",
            "period": "EXACT date range"
        }
    ],
    "skills": {
        "languages": ["programming languages from CV"],
        "frameworks": ["frameworks from CV"],
        "tools": ["tools from CV"],
        "specialties": ["specialties from CV"]
    },
    "certifications": ["EXACT certification names"],
    "languages_spoken": ["languages from CV"]
}
\`\`\``;

export function buildAnalysisPrompt(cvText: string): string {
  return `You are a precise CV data extractor. Your job is to extract ONLY what exists in the CV text below.

## RAW CV TEXT (THIS IS YOUR ONLY SOURCE OF TRUTH):
---
${cvText}
---

## CRITICAL ANTI-HALLUCINATION RULES:
1. **EXACT TEXT ONLY**: Copy titles, names, dates EXACTLY as written in the CV
2. **NO INVENTION**: Do NOT invent years of experience, degrees, or titles
3. **NO ASSUMPTIONS**: If the CV says "Junior Game Developer", output "Junior Game Developer" - NOT "Senior" or "Lead"
4. **DATES**: Use exact date ranges from CV. If CV says "2023-Present", use that exactly
5. **PROJECTS**: Use the EXACT project names as written
6. **VALIDATION**: If you're unsure, copy the raw text rather than paraphrasing

## EXTRACTION TASK:
Extract the following into JSON. Use null for missing fields. DO NOT GUESS.

${OUTPUT_SCHEMA}

IMPORTANT: Output ONLY the JSON. No explanations. Use EXACT text from CV.`;
}

export interface DataAnalyzerOptions {
  model: string;
  temperature?: number;
  contextWindow?: number;
  maxTokens?: number;
  /** Structured-path extractor; override to use custom reasoning delimiters */
  extractStructured?: (text: string) => StructuredPayload | null;
  debug?: boolean;
}

export class DataAnalyzer {
  private readonly model: string;
  private readonly modelOptions: ModelOptions;
  private readonly extract: (text: string) => StructuredPayload | null;
  private readonly debug: boolean;

  constructor(private readonly gateway: ModelGateway, options: DataAnalyzerOptions) {
    this.model = options.model;
    this.modelOptions = {
      temperature: options.temperature ?? 0.3,
      contextWindow: options.contextWindow ?? 8192,
      maxTokens: options.maxTokens ?? 4096,
    };
    this.extract = options.extractStructured ?? defaultExtractStructured;
    this.debug = options.debug ?? false;
  }

  get modelName(): string {
    return this.model;
  }

  async analyze(rawText: string): Promise<StructuredRecord> {
    if (!rawText.trim()) {
      throw new AnalysisError('No CV text provided');
    }

    log.info({ model: this.model }, 'Analyzing CV text (strict extraction)');
    const prompt = buildAnalysisPrompt(rawText);
    if (this.debug) {
      log.debug({ prompt_chars: prompt.length, source_chars: rawText.length }, 'Analysis prompt built');
    }

    const result = await this.converseAndEvict(prompt);
    if (!result.success) {
      throw new AnalysisError(`Model request failed: ${result.error}`);
    }
    const content = result.content;

    if (this.debug) {
      log.debug({ response_chars: content.length }, 'Analysis response received');
    }

    if (!content.trim()) {
      throw new AnalysisError('Model returned an empty response');
    }

    const payload = this.extract(content);
    if (!payload) {
      log.warn('Could not parse structured JSON; continuing with raw analysis');
      return buildDegradedRecord(content, rawText);
    }

    const record = buildRecord(payload, rawText);
    log.info(
      {
        experience: record.experience.length,
        projects: record.projects.length,
        education: record.education.length,
      },
      'CV analysis complete',
    );
    return record;
  }

  private async converseAndEvict(prompt: string): Promise<ModelResult> {
    try {
      return await this.gateway.converse(
        [{ role: 'user', content: prompt }],
        this.model,
        this.modelOptions,
      );
    } finally {
      // Release the model on every path so the coder model can load next
      await this.gateway.evict(this.model);
    }
  }
}
