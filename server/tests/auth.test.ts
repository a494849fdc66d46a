import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { requireSharedSecret } from '../middlewares/auth';

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  const app = express();
  app.use(express.json());
  app.post('/guarded', requireSharedSecret('test-secret'), (_req, res) => res.json({ ok: true }));
  app.post('/unconfigured', requireSharedSecret(''), (_req, res) => res.json({ ok: true }));

  server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const { port } = server.address() as AddressInfo;
  baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

describe('requireSharedSecret', () => {
  it('accepts the header', async () => {
    const res = await post('/guarded', {}, { 'x-internal-secret': 'test-secret' });
    expect(res.status).toBe(200);
  });

  it('accepts secret_key in the body', async () => {
    const res = await post('/guarded', { secret_key: 'test-secret' });
    expect(res.status).toBe(200);
  });

  it('rejects a wrong or missing secret', async () => {
    expect((await post('/guarded', { secret_key: 'wrong' })).status).toBe(401);
    expect((await post('/guarded', {}, { 'x-internal-secret': 'test-secret-but-longer' })).status).toBe(401);
    expect((await post('/guarded', {})).status).toBe(401);
  });

  it('refuses everything when no secret is configured', async () => {
    const res = await post('/unconfigured', { secret_key: '' });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: 'Server secret not configured' });
  });
});
