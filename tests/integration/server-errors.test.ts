import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { PostureServer } from '../../src/web/server.js';
import { postJson, parseBody } from '../helpers/http.js';

vi.mock('../../src/engine/index.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../src/engine/index.js')>();
  return {
    ...actual,
    analyzePosture: () => {
      throw new Error('threshold table unavailable');
    },
  };
});

describe('PostureServer engine failures', () => {
  let server: PostureServer;
  let baseUrl: string;

  beforeAll(async () => {
    server = new PostureServer({ host: '127.0.0.1', port: 0, corsOrigins: [] });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.address().port}`;
  });

  afterAll(async () => {
    await server.stop();
  });

  it('should surface the failure as a server error', async () => {
    const res = await postJson(`${baseUrl}/analyze_posture`, { metrics: { shoulderAngle: 3 } });

    expect(res.status).toBe(500);
    expect(parseBody(res)).toEqual({ detail: 'Internal error during analysis: threshold table unavailable' });
  });
});
