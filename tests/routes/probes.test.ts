import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { createProbeRouter } from '../../src/routes/probes.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';

class UnhealthyStorage extends MemoryStorage {
  override async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    return { ok: false, latencyMs: 7 };
  }
}

class BrokenStorage extends MemoryStorage {
  override async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    throw new Error('database file missing');
  }
}

function createApp(storage: MemoryStorage): Hono {
  const app = new Hono();
  app.route('/', createProbeRouter({ storage }));
  return app;
}

describe('probes', () => {
  it('should report liveness', async () => {
    const res = await createApp(new MemoryStorage()).request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('should report ready storage', async () => {
    const res = await createApp(new MemoryStorage()).request('/ready');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, latencyMs: 0 });
  });

  it('should answer 503 for unhealthy storage', async () => {
    const res = await createApp(new UnhealthyStorage()).request('/ready');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ ok: false, latencyMs: 7 });
  });

  it('should answer 503 when the health check throws', async () => {
    const res = await createApp(new BrokenStorage()).request('/ready');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ ok: false, latencyMs: 0 });
  });
});
