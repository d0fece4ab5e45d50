import { access, readFile } from 'node:fs/promises';
import path from 'node:path';
import { createComponentLogger } from './logger.js';
import { DocumentNotFoundError, UnsupportedDocumentError } from './errors.js';

export interface DocumentExtractor {
  /** Full text of the document; throws if missing or of an unsupported type. */
  extract(filePath: string): Promise<string>;
  supports(filePath: string): boolean;
  readonly supportedExtensions: readonly string[];
}

type DocumentExt = '.pdf' | '.docx' | '.txt';

const SUPPORTED: readonly DocumentExt[] = ['.pdf', '.docx', '.txt'];

const log = createComponentLogger('extractor');

function getExtension(filePath: string): DocumentExt | '' {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED.find((candidate) => candidate === ext) ?? '';
}

export function normalizeText(text: string): string {
  return text.replace(/\u0000/g, '').replace(/[ \t]+\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
}

async function extractFromTxt(filePath: string): Promise<string> {
  return normalizeText(await readFile(filePath, 'utf8'));
}

async function extractFromDocx(filePath: string): Promise<string> {
  const { default: mammoth } = await import('mammoth');
  const result = await mammoth.extractRawText({ path: filePath });
  return normalizeText(result.value ?? '');
}

async function extractFromPdf(filePath: string): Promise<{ text: string; pages: number }> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const data = new Uint8Array(await readFile(filePath));
  const loadingTask = pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true });
  const pages: string[] = [];

  try {
    const pdf = await loadingTask.promise;
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ('str' in item ? `${item.str}${item.hasEOL ? '\n' : ' '}` : ''))
        .join('');
      if (text.trim()) pages.push(text);
    }
  } finally {
    await loadingTask.destroy();
  }

  return { text: normalizeText(pages.join('\n\n')), pages: pages.length };
}

/**
 * Reads CV text from PDF (pdfjs), Word (mammoth) or plain-text files,
 * dispatching on the file extension.
 */
export class FileDocumentExtractor implements DocumentExtractor {
  readonly supportedExtensions: readonly string[] = SUPPORTED;

  supports(filePath: string): boolean {
    return getExtension(filePath) !== '';
  }

  async extract(filePath: string): Promise<string> {
    try {
      await access(filePath);
    } catch {
      throw new DocumentNotFoundError(filePath);
    }

    const ext = getExtension(filePath);
    if (!ext) {
      throw new UnsupportedDocumentError(filePath, path.extname(filePath));
    }

    log.info({ file: path.basename(filePath) }, 'Extracting text');

    let text: string;
    let pages: number | undefined;
    if (ext === '.pdf') {
      ({ text, pages } = await extractFromPdf(filePath));
    } else if (ext === '.docx') {
      text = await extractFromDocx(filePath);
    } else {
      text = await extractFromTxt(filePath);
    }

    const words = text.split(/\s+/).filter(Boolean).length;
    log.info({ words, ...(pages !== undefined ? { pages } : {}) }, 'Text extracted');
    return text;
  }
}
