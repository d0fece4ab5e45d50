/**
 * Pipeline Orchestrator
 *
 * Linear run: select input → extract text → analyze → generate → persist.
 * No stage retries and nothing flows backwards. Every fault is caught once
 * here, logged with its stage, shown to the user and returned as a `failed`
 * result. Debug artifacts written before the fault stay on disk.
 *
 * The orchestrator itself makes no model calls; each stage evicts its own
 * model so only one is resident at a time.
 */

import path from 'node:path';
import { createComponentLogger } from '../lib/logger.js';
import { ExtractionError, PortfolioError, errorMessage } from '../lib/errors.js';
import type { DocumentExtractor } from '../lib/document-extractor.js';
import type { FileService } from '../lib/file-service.js';
import type { FileTypeFilter, UIService } from '../lib/ui-service.js';
import { formatRecordDump } from './record.js';
import type { DataAnalyzer } from './analyzer.js';
import type { PageGenerator } from './page-generator.js';
import type {
  PipelineEmitter,
  PipelineResult,
  PipelineStage,
  StructuredRecord,
} from './types.js';

export const RAW_TEXT_ARTIFACT = 'cv_raw_text';
export const RECORD_ARTIFACT = 'cv_extracted_data';
export const INDEX_ARTIFACT = 'index';

export const CV_FILE_TYPES: FileTypeFilter[] = [
  { label: 'CV documents', patterns: ['*.pdf', '*.docx', '*.txt'] },
];

export interface PipelineDeps {
  extractor: DocumentExtractor;
  analyzer: DataAnalyzer;
  generator: PageGenerator;
  files: FileService;
  ui: UIService;
  emit?: PipelineEmitter;
  /** Injectable clock for the timestamped output name */
  now?: () => Date;
}

const log = createComponentLogger('pipeline');

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in local time */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export class PortfolioPipeline {
  private readonly emit: PipelineEmitter;
  private readonly now: () => Date;
  private stage: PipelineStage = 'select_input';

  constructor(private readonly deps: PipelineDeps) {
    this.emit = deps.emit ?? (() => {});
    this.now = deps.now ?? (() => new Date());
  }

  async run(inputPath?: string): Promise<PipelineResult> {
    this.stage = 'select_input';
    log.info(
      { brain: this.deps.analyzer.modelName, coder: this.deps.generator.modelName },
      'CV → portfolio pipeline starting (sequential model loading)',
    );

    try {
      const sourcePath = await this.step('select_input', () => this.selectInput(inputPath));
      if (!sourcePath) {
        log.warn('No file selected. Exiting.');
        return { status: 'cancelled', stage: 'select_input' };
      }

      const cvText = await this.step('extract_text', () => this.extractText(sourcePath));
      const record = await this.step('analyze', () => this.analyze(cvText));
      const html = await this.step('generate', () => this.deps.generator.generate(record, cvText));
      const { outputPath, indexPath } = await this.step('persist', () => this.persist(html, sourcePath));

      this.emit({ type: 'pipeline_complete', output_path: outputPath, index_path: indexPath });
      log.info({ outputPath, indexPath }, 'Pipeline complete');
      this.deps.ui.showSuccess(
        'Portfolio generated',
        `Main file:\n${outputPath}\n\nQuick access:\n${indexPath}`,
      );
      return { status: 'done', outputPath, indexPath, record };
    } catch (err) {
      return this.fail(err);
    }
  }

  private async step<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    this.stage = stage;
    this.emit({ type: 'stage_start', stage });
    const result = await fn();
    this.emit({ type: 'stage_complete', stage });
    return result;
  }

  private async selectInput(inputPath?: string): Promise<string | null> {
    if (inputPath) return path.resolve(inputPath);
    log.info('Opening file selector');
    const selected = await this.deps.ui.selectFile('Select your CV', CV_FILE_TYPES);
    if (selected) log.info({ file: path.basename(selected) }, 'Selected');
    return selected;
  }

  private async extractText(sourcePath: string): Promise<string> {
    const text = await this.deps.extractor.extract(sourcePath);
    if (!text.trim()) {
      throw new ExtractionError('No text could be extracted from the document');
    }
    await this.deps.files.save(text, RAW_TEXT_ARTIFACT, 'txt');
    return text;
  }

  private async analyze(cvText: string): Promise<StructuredRecord> {
    const record = await this.deps.analyzer.analyze(cvText);
    const dumpPath = await this.deps.files.save(formatRecordDump(record), RECORD_ARTIFACT, 'json');
    log.info({ path: dumpPath, degraded: record.raw_analysis !== null }, 'Extracted data saved');
    return record;
  }

  private async persist(html: string, sourcePath: string): Promise<{ outputPath: string; indexPath: string }> {
    const baseName = path.parse(sourcePath).name;
    const outputPath = await this.deps.files.save(html, `${baseName}_portfolio_${formatTimestamp(this.now())}`);
    const indexPath = await this.deps.files.save(html, INDEX_ARTIFACT);
    return { outputPath, indexPath };
  }

  private fail(err: unknown): PipelineResult {
    const stage = err instanceof PortfolioError ? err.stage : this.stage;
    const error = errorMessage(err);
    log.error({ err, stage }, 'Pipeline failed');
    this.emit({ type: 'pipeline_error', stage, error });
    try {
      this.deps.ui.showError('Pipeline Error', `An error occurred:\n\n${error}`);
    } catch (notifyErr) {
      log.warn({ error: errorMessage(notifyErr) }, 'Failed to show error notification');
    }
    return { status: 'failed', stage, error };
  }
}
