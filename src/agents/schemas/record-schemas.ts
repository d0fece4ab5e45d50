/**
 * Zod schemas that normalize the analysis model's JSON into RecordFields.
 *
 * Model output is unpredictable, so nothing here rejects: missing keys, nulls
 * and wrong types collapse to the empty value for that field, list items of the
 * wrong shape are dropped, and unknown keys (e.g. the prompt's `validation`
 * block) are stripped.
 */

import { z } from 'zod';
import type { RecordFields } from '../types.js';

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/** String field; '' when absent */
const text = z.unknown().transform(toText);

/** Optional string field; null when absent or blank */
const optionalText = z.unknown().transform((value): string | null => toText(value) || null);

/** List of strings; a lone string becomes a one-item list */
const textList = z.unknown().transform((value): string[] => {
  if (typeof value === 'string') return value.trim() ? [value.trim()] : [];
  if (!Array.isArray(value)) return [];
  return value.map(toText).filter(Boolean);
});

/** List of objects; entries that fail `schema` are dropped */
function entryList<T extends z.ZodTypeAny>(schema: T) {
  return z.unknown().transform((value): z.output<T>[] => {
    if (!Array.isArray(value)) return [];
    return value.flatMap((item) => {
      const result = schema.safeParse(item);
      return result.success ? [result.data] : [];
    });
  });
}

/** Nested object; falls back to the schema's all-defaults shape */
function section<T extends z.ZodTypeAny>(schema: T) {
  return z.unknown().transform((value): z.output<T> => {
    const result = schema.safeParse(value);
    return result.success ? result.data : schema.parse({});
  });
}

export const PersonalSchema = z.object({
  name: text,
  title: text,
  tagline: text,
  bio: text,
  email: optionalText,
  phone: optionalText,
  location: optionalText,
});

export const LinksSchema = z.object({
  linkedin: optionalText,
  github: optionalText,
  website: optionalText,
  other: textList,
});

export const ExperienceSchema = z.object({
  company: text,
  role: text,
  period: text,
  description: text,
  highlights: textList,
});

export const ProjectSchema = z.object({
  name: text,
  description: text,
  tech_stack: textList,
  link: optionalText,
  type: text,
});

export const EducationSchema = z.object({
  institution: text,
  degree: text,
  period: text,
});

export const SkillsSchema = z.object({
  languages: textList,
  frameworks: textList,
  tools: textList,
  specialties: textList,
});

export const RecordFieldsSchema = z.object({
  personal: section(PersonalSchema),
  links: section(LinksSchema),
  experience: entryList(ExperienceSchema),
  projects: entryList(ProjectSchema),
  education: entryList(EducationSchema),
  skills: section(SkillsSchema),
  certifications: textList,
  languages_spoken: textList,
});

/** Parses any model payload into RecordFields. Never throws. */
export function normalizeRecordFields(payload: Record<string, unknown>): RecordFields {
  return RecordFieldsSchema.parse(payload);
}
