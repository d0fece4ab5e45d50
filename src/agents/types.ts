/**
 * Shared types for the CV → portfolio pipeline.
 *
 * Field names are snake_case so the structured record serializes directly into
 * the JSON shape the analysis prompt asks the model for.
 */

// ─── Structured record ───────────────────────────────────────────────

export interface PersonalInfo {
  name: string;
  title: string;
  tagline: string;
  bio: string;
  email: string | null;
  phone: string | null;
  location: string | null;
}

export interface Links {
  linkedin: string | null;
  github: string | null;
  website: string | null;
  other: string[];
}

export interface ExperienceEntry {
  company: string;
  role: string;
  period: string;
  description: string;
  highlights: string[];
}

export interface ProjectEntry {
  name: string;
  description: string;
  tech_stack: string[];
  link: string | null;
  /** Free-form tag such as "Game", "Web" or "App" */
  type: string;
}

export interface EducationEntry {
  institution: string;
  degree: string;
  period: string;
}

export interface SkillGroups {
  languages: string[];
  frameworks: string[];
  tools: string[];
  specialties: string[];
}

/** The parts of a record that come from the model's JSON. */
export interface RecordFields {
  personal: PersonalInfo;
  links: Links;
  experience: ExperienceEntry[];
  projects: ProjectEntry[];
  education: EducationEntry[];
  skills: SkillGroups;
  certifications: string[];
  languages_spoken: string[];
}

/**
 * Normalized output of analysis. Either parsed (raw_analysis null) or degraded
 * (raw_analysis holds the unparsed model text and every list is empty).
 */
export interface StructuredRecord extends RecordFields {
  raw_analysis: string | null;
  source_text: string;
}

// ─── Model access ────────────────────────────────────────────────────

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ModelOptions {
  temperature: number;
  contextWindow: number;
  maxTokens: number;
}

export type ModelResult =
  | { success: true; content: string; model: string }
  | { success: false; error: string; model: string };

// ─── Pipeline ────────────────────────────────────────────────────────

export type PipelineStage =
  | 'select_input'
  | 'extract_text'
  | 'analyze'
  | 'generate'
  | 'persist';

export type PipelineEvent =
  | { type: 'stage_start'; stage: PipelineStage }
  | { type: 'stage_complete'; stage: PipelineStage }
  | { type: 'pipeline_complete'; output_path: string; index_path: string }
  | { type: 'pipeline_error'; stage: PipelineStage; error: string };

export type PipelineEmitter = (event: PipelineEvent) => void;

export type PipelineResult =
  | { status: 'done'; outputPath: string; indexPath: string; record: StructuredRecord }
  | { status: 'cancelled'; stage: 'select_input' }
  | { status: 'failed'; stage: PipelineStage; error: string };
