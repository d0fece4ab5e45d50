import type { PipelineStage } from '../agents/types.js';

/**
 * Base class for faults raised by a pipeline stage. The orchestrator catches
 * these once at the top level and reports `stage` alongside the message.
 */
export class PortfolioError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class DocumentNotFoundError extends PortfolioError {
  constructor(readonly filePath: string) {
    super('extract_text', `Document not found: ${filePath}`);
  }
}

export class UnsupportedDocumentError extends PortfolioError {
  constructor(readonly filePath: string, readonly extension: string) {
    super('extract_text', `Unsupported file type: ${extension || '(none)'}`);
  }
}

/** The document was read but yielded no text. */
export class ExtractionError extends PortfolioError {
  constructor(message: string) {
    super('extract_text', message);
  }
}

export class AnalysisError extends PortfolioError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('analyze', message, options);
  }
}

export class GenerationError extends PortfolioError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generate', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
