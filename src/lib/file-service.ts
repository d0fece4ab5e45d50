import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createComponentLogger } from './logger.js';

export interface FileService {
  readonly outputDirectory: string;
  /** Writes `<name>.<ext>` under the output directory and returns its path. */
  save(content: string, name: string, ext?: string): Promise<string>;
  read(filePath: string): Promise<string>;
}

const log = createComponentLogger('files');

export class LocalFileService implements FileService {
  readonly outputDirectory: string;

  constructor(outputDir: string) {
    this.outputDirectory = path.resolve(outputDir);
  }

  async save(content: string, name: string, ext = 'html'): Promise<string> {
    await mkdir(this.outputDirectory, { recursive: true });
    const target = path.join(this.outputDirectory, `${name}.${ext}`);
    await writeFile(target, content, 'utf8');
    log.info({ path: target }, 'Saved');
    return target;
  }

  async read(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }
}
