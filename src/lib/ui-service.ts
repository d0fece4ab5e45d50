import { createInterface } from 'node:readline/promises';
import path from 'node:path';
import { createComponentLogger } from './logger.js';

export interface FileTypeFilter {
  label: string;
  /** Glob-style patterns such as `*.pdf`; `*.*` accepts anything */
  patterns: string[];
}

export interface UIService {
  /** Resolves the chosen absolute path, or null when the user declines. */
  selectFile(title: string, fileTypes?: FileTypeFilter[]): Promise<string | null>;
  showSuccess(title: string, message: string): void;
  showError(title: string, message: string): void;
  showInfo(title: string, message: string): void;
}

export interface TerminalStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const MAX_SELECT_ATTEMPTS = 3;

const log = createComponentLogger('ui');

export function matchesFileTypes(filePath: string, fileTypes: FileTypeFilter[]): boolean {
  if (fileTypes.length === 0) return true;
  const ext = path.extname(filePath).toLowerCase();
  return fileTypes.some((filter) =>
    filter.patterns.some((pattern) => pattern === '*.*' || pattern === '*' || pattern.toLowerCase() === `*${ext}`),
  );
}

/** Drag-and-drop into a terminal wraps paths in quotes. */
function cleanAnswer(answer: string): string {
  return answer.trim().replace(/^(['"])(.*)\1$/, '$2').trim();
}

/**
 * Terminal stand-in for the desktop dialogs: prompts for a path on stdin and
 * prints notifications to stdout.
 */
export class TerminalUIService implements UIService {
  private readonly streams: TerminalStreams;

  constructor(streams?: TerminalStreams) {
    this.streams = streams ?? { input: process.stdin, output: process.stdout };
  }

  async selectFile(title: string, fileTypes: FileTypeFilter[] = []): Promise<string | null> {
    const hint = fileTypes.length > 0
      ? ` [${fileTypes.map((f) => `${f.label}: ${f.patterns.join(' ')}`).join('; ')}]`
      : '';
    const rl = createInterface({ input: this.streams.input, output: this.streams.output, terminal: false });
    const closed = new Promise<null>((resolve) => rl.once('close', () => resolve(null)));

    try {
      for (let attempt = 1; attempt <= MAX_SELECT_ATTEMPTS; attempt++) {
        const answer = await Promise.race([
          rl.question(`${title}${hint} (blank to cancel): `).catch(() => null),
          closed,
        ]);
        if (answer === null) return null;

        const chosen = cleanAnswer(answer);
        if (!chosen) return null;

        if (matchesFileTypes(chosen, fileTypes)) {
          return path.resolve(chosen);
        }
        this.streams.output.write(`Not an accepted file type: ${path.basename(chosen)}\n`);
      }
      return null;
    } finally {
      rl.close();
    }
  }

  showSuccess(title: string, message: string): void {
    log.info({ title }, message);
    this.streams.output.write(`\n[ok] ${title}\n${message}\n\n`);
  }

  showError(title: string, message: string): void {
    log.error({ title }, message);
    this.streams.output.write(`\n[error] ${title}\n${message}\n\n`);
  }

  showInfo(title: string, message: string): void {
    log.info({ title }, message);
    this.streams.output.write(`\n[info] ${title}\n${message}\n\n`);
  }
}
