import { normalizeRecordFields } from './schemas/record-schemas.js';
import type { RecordFields, StructuredRecord } from './types.js';

export function emptyRecordFields(): RecordFields {
  return normalizeRecordFields({});
}

/** Freezes `value` and every object or array reachable from it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Record built from a successfully parsed model payload. */
export function buildRecord(payload: Record<string, unknown>, sourceText: string): StructuredRecord {
  return deepFreeze({
    ...normalizeRecordFields(payload),
    raw_analysis: null,
    source_text: sourceText,
  });
}

/**
 * Record for the degraded path: the model answered but nothing parsed, so the
 * raw reply is carried forward in place of structured fields.
 */
export function buildDegradedRecord(rawAnalysis: string, sourceText: string): StructuredRecord {
  const raw = rawAnalysis.trim();
  if (!raw) {
    throw new Error('Degraded record requires non-empty raw analysis');
  }
  return deepFreeze({
    ...emptyRecordFields(),
    raw_analysis: raw,
    source_text: sourceText,
  });
}

export function isDegraded(record: StructuredRecord): boolean {
  return record.raw_analysis !== null;
}

/**
 * JSON-ready view of a record: every structured field, plus `raw_analysis` only
 * when analysis degraded. The source text is never included.
 */
export function serializeRecord(record: StructuredRecord): Record<string, unknown> {
  const { raw_analysis, source_text: _sourceText, ...fields } = record;
  return raw_analysis !== null ? { ...fields, raw_analysis } : { ...fields };
}

/** Pretty-printed dump, two-space indent. JSON.stringify keeps non-ASCII as-is. */
export function formatRecordDump(record: StructuredRecord): string {
  return JSON.stringify(serializeRecord(record), null, 2);
}
