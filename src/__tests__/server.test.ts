import { vi, describe, it, expect, beforeEach } from 'vitest';
import { createApp } from '../server.js';
import { DataAnalyzer } from '../agents/analyzer.js';
import { PageGenerator } from '../agents/page-generator.js';
import type { ModelGateway } from '../lib/model-gateway.js';
import type { ModelResult } from '../agents/types.js';

const ANALYSIS_REPLY = '{"personal": {"name": "Ada Example"}, "skills": {"languages": ["TypeScript"]}}';
const PAGE = "<!DOCTYPE html><html><head></head><body><script>x.classList.add('aos-animate')</script></body></html>";

function makeGateway() {
  return {
    generate: vi.fn<ModelGateway['generate']>(),
    converse: vi.fn<ModelGateway['converse']>(async (_messages, model): Promise<ModelResult> => ({
      success: true,
      content: model === 'brain' ? ANALYSIS_REPLY : PAGE,
      model,
    })),
    evict: vi.fn<ModelGateway['evict']>().mockResolvedValue(true),
    isAvailable: vi.fn<ModelGateway['isAvailable']>().mockResolvedValue(true),
  };
}

function buildApp(gateway: ReturnType<typeof makeGateway>) {
  return createApp({
    gateway,
    analyzer: new DataAnalyzer(gateway, { model: 'brain' }),
    generator: new PageGenerator(gateway, { model: 'coder' }),
  });
}

function postPortfolio(app: ReturnType<typeof buildApp>, body: string) {
  return app.request('http://test/api/portfolio', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('HTTP surface', () => {
  let gateway: ReturnType<typeof makeGateway>;
  let app: ReturnType<typeof buildApp>;

  beforeEach(() => {
    gateway = makeGateway();
    app = buildApp(gateway);
  });

  describe('GET /health', () => {
    it('reports ok when the runtime answers', async () => {
      const res = await app.request('http://test/health');

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.get('X-Request-ID')).toBeTruthy();
      expect(await res.json()).toEqual({ status: 'ok', runtime_available: true });
    });

    it('reports degraded when the runtime is down', async () => {
      gateway.isAvailable.mockResolvedValueOnce(false);

      const res = await app.request('http://test/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'degraded', runtime_available: false });
    });
  });

  describe('POST /api/portfolio', () => {
    it('returns the page, the serialized record and the degraded flag', async () => {
      const res = await postPortfolio(app, JSON.stringify({ cv_text: 'Ada Example\nTypeScript' }));

      expect(res.status).toBe(200);
      const body = await res.json() as { html: string; record: Record<string, unknown>; degraded: boolean };
      expect(body.html).toBe(PAGE);
      expect(body.degraded).toBe(false);
      expect(body.record).toMatchObject({
        personal: { name: 'Ada Example' },
        skills: { languages: ['TypeScript'] },
      });
      expect(body.record).not.toHaveProperty('source_text');
      expect(body.record).not.toHaveProperty('raw_analysis');
      expect(gateway.evict.mock.calls).toEqual([['brain'], ['coder']]);
    });

    it('flags degraded analysis', async () => {
      gateway.converse.mockResolvedValueOnce({ success: true, content: 'Name: Ada Example', model: 'brain' });

      const res = await postPortfolio(app, JSON.stringify({ cv_text: 'Ada Example' }));

      expect(res.status).toBe(200);
      const body = await res.json() as { degraded: boolean; record: Record<string, unknown> };
      expect(body.degraded).toBe(true);
      expect(body.record.raw_analysis).toBe('Name: Ada Example');
    });

    it('rejects a body that is not JSON', async () => {
      const res = await postPortfolio(app, 'cv_text=Ada');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body must be JSON' });
    });

    it('rejects a missing or blank cv_text', async () => {
      const missing = await postPortfolio(app, JSON.stringify({ text: 'Ada' }));
      const blank = await postPortfolio(app, JSON.stringify({ cv_text: '   ' }));

      expect(missing.status).toBe(400);
      expect(blank.status).toBe(400);
      expect(await blank.json()).toEqual({ error: 'cv_text: cv_text is required' });
      expect(gateway.converse).not.toHaveBeenCalled();
    });

    it('maps model failures to 502 with the failing stage', async () => {
      gateway.converse.mockResolvedValueOnce({ success: false, error: 'fetch failed', model: 'brain' });

      const res = await postPortfolio(app, JSON.stringify({ cv_text: 'Ada Example' }));

      expect(res.status).toBe(502);
      const body = await res.json() as { error: string; stage: string; request_id: string };
      expect(body.error).toBe('Model request failed: fetch failed');
      expect(body.stage).toBe('analyze');
      expect(body.request_id).toBe(res.headers.get('X-Request-ID'));
    });

    it('reports generation failures as the generate stage', async () => {
      gateway.converse
        .mockResolvedValueOnce({ success: true, content: ANALYSIS_REPLY, model: 'brain' })
        .mockResolvedValueOnce({ success: true, content: '', model: 'coder' });

      const res = await postPortfolio(app, JSON.stringify({ cv_text: 'Ada Example' }));

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({ error: 'Model returned an empty document', stage: 'generate' });
    });

    it('returns 500 for unexpected faults', async () => {
      gateway.converse.mockRejectedValueOnce(new Error('socket hang up'));

      const res = await app.request('http://test/api/portfolio', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Request-ID': 'req-42' },
        body: JSON.stringify({ cv_text: 'Ada Example' }),
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Internal server error', request_id: 'req-42' });
    });

    it('refuses a second request while one is generating', async () => {
      let release: (result: ModelResult) => void = () => {};
      gateway.converse.mockImplementationOnce(() => new Promise<ModelResult>((resolve) => {
        release = resolve;
      }));

      const first = postPortfolio(app, JSON.stringify({ cv_text: 'Ada Example' }));
      await vi.waitFor(() => expect(gateway.converse).toHaveBeenCalledTimes(1));

      const second = await postPortfolio(app, JSON.stringify({ cv_text: 'Someone Else' }));
      expect(second.status).toBe(409);

      release({ success: true, content: ANALYSIS_REPLY, model: 'brain' });
      expect((await first).status).toBe(200);

      const third = await postPortfolio(app, JSON.stringify({ cv_text: 'Someone Else' }));
      expect(third.status).toBe(200);
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await app.request('http://test/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('echoes a valid caller request id and replaces an unsafe one', async () => {
    const echoed = await app.request('http://test/health', { headers: { 'X-Request-ID': 'trace-1' } });
    const replaced = await app.request('http://test/health', { headers: { 'X-Request-ID': 'bad id' } });

    expect(echoed.headers.get('X-Request-ID')).toBe('trace-1');
    expect(replaced.headers.get('X-Request-ID')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('allows any origin by default and exposes the request id header', async () => {
    const res = await app.request('http://test/health', { headers: { Origin: 'http://localhost:5173' } });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(res.headers.get('Access-Control-Expose-Headers')).toBe('X-Request-ID');
  });
});
