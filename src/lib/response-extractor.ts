/**
 * Recovers a JSON object or a full HTML document from free-form model output.
 *
 * Reasoning models wrap their answer in a chain-of-thought region and often
 * fence the payload in markdown. Structured extraction strips the reasoning
 * first, prefers a fenced object literal and falls back to the outermost brace
 * span. Markup extraction never fails: with no document found it hands back
 * the trimmed input.
 */

export interface ReasoningDelimiters {
  open: string;
  close: string;
}

export const DEFAULT_REASONING_DELIMITERS: ReasoningDelimiters = {
  open: '<think>',
  close: '</think>',
};

export type StructuredPayload = Record<string, unknown>;

export interface ResponseExtractor {
  stripReasoning(text: string): string;
  extractStructured(text: string): StructuredPayload | null;
  extractMarkup(text: string): string;
}

const FENCED_OBJECT_RE = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;
const OUTERMOST_OBJECT_RE = /\{[\s\S]*\}/;
const FENCED_DOCUMENT_RE = /```(?:html)?\s*(<!DOCTYPE[\s\S]*?<\/html>)\s*```/i;
const BARE_DOCUMENT_RE = /(<!DOCTYPE[\s\S]*<\/html>)/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isPlainObject(value: unknown): value is StructuredPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Plain parse first, then one repair pass for trailing commas
 * (`{"a": 1,}`), which local models emit often.
 */
function parseObject(candidate: string): StructuredPayload | null {
  const attempts = [candidate, candidate.replace(/,\s*([\]}])/g, '$1')];
  for (const attempt of attempts) {
    try {
      const parsed: unknown = JSON.parse(attempt);
      if (isPlainObject(parsed)) return parsed;
    } catch {
      // next attempt
    }
  }
  return null;
}

export function createResponseExtractor(
  delimiters: ReasoningDelimiters = DEFAULT_REASONING_DELIMITERS,
): ResponseExtractor {
  const reasoningRe = new RegExp(
    `${escapeRegExp(delimiters.open)}[\\s\\S]*?${escapeRegExp(delimiters.close)}`,
    'g',
  );

  function stripReasoning(text: string): string {
    return text.replace(reasoningRe, '');
  }

  function extractStructured(text: string): StructuredPayload | null {
    if (!text) return null;
    const cleaned = stripReasoning(text);

    const fenced = FENCED_OBJECT_RE.exec(cleaned);
    if (fenced) {
      const parsed = parseObject(fenced[1]);
      if (parsed) return parsed;
    }

    // Greedy: spans from the first `{` to the last `}`, which may swallow
    // trailing prose. Accepted; the parse below rejects anything that breaks.
    const outermost = OUTERMOST_OBJECT_RE.exec(cleaned);
    if (outermost) {
      const parsed = parseObject(outermost[0]);
      if (parsed) return parsed;
    }

    return null;
  }

  function extractMarkup(text: string): string {
    const fenced = FENCED_DOCUMENT_RE.exec(text);
    if (fenced) return fenced[1].trim();

    const bare = BARE_DOCUMENT_RE.exec(text);
    if (bare) return bare[1].trim();

    return text.trim();
  }

  return { stripReasoning, extractStructured, extractMarkup };
}

const defaultExtractor = createResponseExtractor();

export const stripReasoning = defaultExtractor.stripReasoning;
export const extractStructured = defaultExtractor.extractStructured;
export const extractMarkup = defaultExtractor.extractMarkup;
