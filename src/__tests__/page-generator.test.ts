import { vi, describe, it, expect, beforeEach } from 'vitest';
import { PageGenerator, applyFixes } from '../agents/page-generator.js';
import {
  REVEAL_SCRIPT_PATCH,
  REVEAL_STYLE_PATCH,
  SCRIPT_PATCH_ATTR,
  STYLE_PATCH_ATTR,
  buildDataSection,
  buildGenerationPrompt,
} from '../agents/page-prompts.js';
import { buildDegradedRecord, buildRecord } from '../agents/record.js';
import { GenerationError } from '../lib/errors.js';
import type { ModelGateway } from '../lib/model-gateway.js';
import type { ModelResult } from '../agents/types.js';

function makeGateway(reply: ModelResult) {
  return {
    generate: vi.fn<ModelGateway['generate']>(),
    converse: vi.fn<ModelGateway['converse']>().mockResolvedValue(reply),
    evict: vi.fn<ModelGateway['evict']>().mockResolvedValue(true),
    isAvailable: vi.fn<ModelGateway['isAvailable']>().mockResolvedValue(true),
  };
}

function ok(content: string): ModelResult {
  return { success: true, content, model: 'coder-model' };
}

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

const PLAIN_PAGE = '<!DOCTYPE html>\n<html>\n<head>\n<title>Ada</title>\n</head>\n<body>\n<main>Hi</main>\n</body>\n</html>';

describe('applyFixes', () => {
  it('puts the style patch before </head> and the script patch before </body>', () => {
    const patched = applyFixes(PLAIN_PAGE);

    expect(patched).toBe(
      '<!DOCTYPE html>\n<html>\n<head>\n<title>Ada</title>\n'
      + `${REVEAL_STYLE_PATCH}\n</head>\n<body>\n<main>Hi</main>\n`
      + `${REVEAL_SCRIPT_PATCH}\n</body>\n</html>`,
    );
  });

  it('is idempotent', () => {
    const once = applyFixes(PLAIN_PAGE);
    expect(applyFixes(once)).toBe(once);
    expect(count(once, STYLE_PATCH_ATTR)).toBe(1);
    expect(count(once, SCRIPT_PATCH_ATTR)).toBe(1);
  });

  it('leaves pages that already reference the reveal class alone', () => {
    const page = '<html><body><script>el.classList.add("AOS-ANIMATE")</script></body></html>';
    expect(applyFixes(page)).toBe(page);
  });

  it('matches closing tags case-insensitively and patches before the last </body>', () => {
    const page = '<HTML><HEAD></HEAD><BODY><pre>&lt;/body&gt;</pre>\n</body>\n<!-- x --></BODY></HTML>';
    const patched = applyFixes(page);

    expect(patched.indexOf(REVEAL_STYLE_PATCH)).toBe('<HTML><HEAD>'.length);
    expect(patched.endsWith(`${REVEAL_SCRIPT_PATCH}\n</BODY></HTML>`)).toBe(true);
  });

  it('keeps the patches outside the closing tags when the page has non-ASCII text', () => {
    const page = '<!DOCTYPE html><html><head><title>İstanbul</title></head>'
      + '<body><p>İzmir, İstanbul</p></body></html>';

    expect(applyFixes(page)).toBe(
      '<!DOCTYPE html><html><head><title>İstanbul</title>'
      + `${REVEAL_STYLE_PATCH}\n</head><body><p>İzmir, İstanbul</p>`
      + `${REVEAL_SCRIPT_PATCH}\n</body></html>`,
    );
  });

  it('moves the style patch next to the script when there is no head', () => {
    const patched = applyFixes('<body><p>x</p></body>');
    expect(patched).toBe(`<body><p>x</p>${REVEAL_STYLE_PATCH}\n${REVEAL_SCRIPT_PATCH}\n</body>`);
  });

  it('appends both patches when neither tag is present', () => {
    expect(applyFixes('<p>fragment</p>')).toBe(`<p>fragment</p>\n${REVEAL_STYLE_PATCH}\n${REVEAL_SCRIPT_PATCH}\n`);
  });
});

describe('buildGenerationPrompt', () => {
  const cvText = 'Ada Example\nJunior Game Developer';

  it('carries the JSON dump of a parsed record and a preview of the source', () => {
    const record = buildRecord({ personal: { name: 'Ada Example' } }, cvText);
    const prompt = buildGenerationPrompt(record, cvText);

    expect(prompt).toContain('## PORTFOLIO DATA (JSON):\n```json\n{\n  "personal": {\n    "name": "Ada Example",');
    expect(prompt).not.toContain('## ANALYZED CV DATA:');
    expect(prompt).toContain(`## ORIGINAL CV TEXT (FOR VERIFICATION - USE EXACT DATA):\n\`\`\`\n${cvText}\n\`\`\``);
  });

  it('carries the raw analysis of a degraded record instead of JSON', () => {
    const record = buildDegradedRecord('Name: Ada Example', cvText);

    expect(buildDataSection(record)).toBe('## ANALYZED CV DATA:\nName: Ada Example');
    const prompt = buildGenerationPrompt(record, cvText);
    expect(prompt).toContain('## ANALYZED CV DATA:\nName: Ada Example');
    expect(prompt).not.toContain('## PORTFOLIO DATA (JSON):');
  });

  it('truncates the source preview', () => {
    const record = buildRecord({}, '');
    const prompt = buildGenerationPrompt(record, 'abcdefghij', 4);

    expect(prompt).toContain('USE EXACT DATA):\n```\nabcd\n```');
    expect(prompt).not.toContain('abcde');
  });
});

describe('PageGenerator', () => {
  const record = buildRecord({ personal: { name: 'Ada Example' } }, 'Ada Example (from record)');
  let gateway: ReturnType<typeof makeGateway>;

  beforeEach(() => {
    gateway = makeGateway(ok(`Here is your page:\n\`\`\`html\n${PLAIN_PAGE}\n\`\`\`\nEnjoy!`));
  });

  it('extracts the document and patches it when the reveal fallback is missing', async () => {
    const generator = new PageGenerator(gateway, { model: 'coder-model' });

    const html = await generator.generate(record, 'Ada Example');

    expect(html).toBe(applyFixes(PLAIN_PAGE));
  });

  it('returns pages that already carry the reveal fallback unchanged', async () => {
    const page = PLAIN_PAGE.replace('</body>', "<script>el.classList.add('aos-animate')</script></body>");
    gateway = makeGateway(ok(page));
    const generator = new PageGenerator(gateway, { model: 'coder-model' });

    await expect(generator.generate(record)).resolves.toBe(page);
  });

  it('builds the prompt from the given source text, falling back to the record', async () => {
    const generator = new PageGenerator(gateway, { model: 'coder-model', sourcePreviewChars: 500 });

    await generator.generate(record, 'Explicit source');
    await generator.generate(record);

    const first = gateway.converse.mock.calls[0][0][0].content;
    const second = gateway.converse.mock.calls[1][0][0].content;
    expect(first).toBe(buildGenerationPrompt(record, 'Explicit source', 500));
    expect(second).toBe(buildGenerationPrompt(record, 'Ada Example (from record)', 500));
  });

  it('uses temperature 0.2 by default and evicts its model once per call', async () => {
    const generator = new PageGenerator(gateway, { model: 'coder-model' });

    await generator.generate(record);

    expect(gateway.converse.mock.calls[0][2]).toEqual({ temperature: 0.2, contextWindow: 8192, maxTokens: 4096 });
    expect(gateway.evict).toHaveBeenCalledTimes(1);
    expect(gateway.evict).toHaveBeenCalledWith('coder-model');
  });

  it('raises GenerationError on a failed model call and still evicts', async () => {
    gateway = makeGateway({ success: false, error: 'out of memory', model: 'coder-model' });
    const generator = new PageGenerator(gateway, { model: 'coder-model' });

    const pending = generator.generate(record);

    await expect(pending).rejects.toBeInstanceOf(GenerationError);
    await expect(pending).rejects.toThrow('Model request failed: out of memory');
    expect(gateway.evict).toHaveBeenCalledTimes(1);
  });

  it('raises GenerationError when the model returns nothing usable', async () => {
    gateway = makeGateway(ok('  \n '));
    const generator = new PageGenerator(gateway, { model: 'coder-model' });

    await expect(generator.generate(record)).rejects.toThrow('Model returned an empty document');
  });

  it('patches a fragment that lacks a doctype', async () => {
    gateway = makeGateway(ok('<section>Only a fragment</section>'));
    const generator = new PageGenerator(gateway, { model: 'coder-model' });

    await expect(generator.generate(record)).resolves.toBe(applyFixes('<section>Only a fragment</section>'));
  });

  it('exposes applyFixes and the model name', () => {
    const generator = new PageGenerator(gateway, { model: 'coder-model' });
    expect(generator.modelName).toBe('coder-model');
    expect(generator.applyFixes(PLAIN_PAGE)).toBe(applyFixes(PLAIN_PAGE));
  });
});
