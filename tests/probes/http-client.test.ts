import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'http';
import net from 'net';
import { ProbeHttpClient } from '../../src/probes/http-client.js';

const hits = new Map<string, number>();

const server = http.createServer((req, res) => {
  const path = req.url ?? '/';
  const count = (hits.get(path) ?? 0) + 1;
  hits.set(path, count);

  switch (path) {
    case '/agent':
      res.end(req.headers['user-agent'] ?? '');
      return;
    case '/old':
      res.writeHead(302, { Location: '/new' });
      res.end();
      return;
    case '/new':
      res.end('moved here');
      return;
    case '/loop':
      res.writeHead(302, { Location: '/loop' });
      res.end();
      return;
    case '/broken':
      res.writeHead(500, { 'Content-Type': 'text/plain' });
      res.end('upstream exploded');
      return;
    case '/big':
      res.end('a'.repeat(5000));
      return;
    case '/headers':
      res.setHeader('X-Frame-Options', 'DENY');
      res.setHeader('Set-Cookie', ['session=test-secret', 'theme=dark']);
      res.end('ok');
      return;
    case '/flaky':
      if (count === 1) {
        req.socket.destroy();
        return;
      }
      res.end('second time lucky');
      return;
    case '/drip': {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      const timer = setInterval(() => res.write('x'), 100);
      res.on('close', () => clearInterval(timer));
      return;
    }
    default:
      res.writeHead(404);
      res.end('missing');
  }
});

let base = '';
let closedPort = 0;

function listen(target: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    target.once('error', reject);
    target.listen(0, '127.0.0.1', () => {
      const address = target.address();
      if (address && typeof address === 'object') {
        resolve(address.port);
      } else {
        reject(new Error('no port assigned'));
      }
    });
  });
}

beforeAll(async () => {
  base = `http://127.0.0.1:${await listen(server)}`;
  const released = net.createServer();
  closedPort = await listen(released);
  await new Promise<void>((resolve) => released.close(() => resolve()));
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('ProbeHttpClient', () => {
  it('sends the configured user agent', async () => {
    const client = new ProbeHttpClient({ userAgent: 'test-agent', timeout: 2000 });

    const result = await client.get(`${base}/agent`);

    expect(result.success && result.data).toBe('test-agent');
  });

  it('returns error statuses as results instead of throwing', async () => {
    const client = new ProbeHttpClient({ timeout: 2000 });

    const result = await client.get(`${base}/broken`);

    expect(result).toMatchObject({ success: true, status: 500, data: 'upstream exploded' });
  });

  it('follows a relative redirect and keeps the requested url', async () => {
    const client = new ProbeHttpClient({ timeout: 2000 });

    const result = await client.get(`${base}/old`);

    expect(result).toMatchObject({
      success: true,
      status: 200,
      data: 'moved here',
      url: `${base}/old`,
      finalUrl: `${base}/new`,
    });
  });

  it('hands back the redirect itself when asked not to follow', async () => {
    const client = new ProbeHttpClient({ timeout: 2000 });

    const result = await client.get(`${base}/old`, { followRedirects: false });

    expect(result).toMatchObject({ success: true, status: 302, finalUrl: `${base}/old` });
    expect(result.success && result.headers['location']).toBe('/new');
  });

  it('stops a redirect loop after five hops', async () => {
    const client = new ProbeHttpClient({ timeout: 2000 });
    hits.delete('/loop');

    const result = await client.get(`${base}/loop`);

    expect(result).toMatchObject({ success: true, status: 302 });
    expect(hits.get('/loop')).toBe(6);
  });

  it('truncates bodies past the content limit', async () => {
    const client = new ProbeHttpClient({ timeout: 2000, maxContentLength: 100 });

    const result = await client.get(`${base}/big`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toBe('a'.repeat(100));
    expect(result.truncated).toBe(true);
  });

  it('lower-cases header names and joins repeated headers', async () => {
    const client = new ProbeHttpClient({ timeout: 2000 });

    const result = await client.get(`${base}/headers`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.headers['x-frame-options']).toBe('DENY');
    expect(result.headers['set-cookie']).toBe('session=test-secret, theme=dark');
  });

  it('retries a dropped connection', async () => {
    const client = new ProbeHttpClient({ timeout: 2000, retryAttempts: 2, retryDelay: 10 });
    hits.delete('/flaky');

    const result = await client.get(`${base}/flaky`);

    expect(result).toMatchObject({ success: true, status: 200, data: 'second time lucky' });
    expect(hits.get('/flaky')).toBe(2);
  });

  it('reports an unreachable host as a failed result', async () => {
    const client = new ProbeHttpClient({ timeout: 2000, retryAttempts: 2, retryDelay: 10 });

    const result = await client.get(`http://127.0.0.1:${closedPort}/`);

    expect(result).toMatchObject({ success: false, code: 'ECONNREFUSED', url: `http://127.0.0.1:${closedPort}/` });
  });

  it('gives up on a body that never finishes and frees its slot', async () => {
    const client = new ProbeHttpClient({ timeout: 300, maxConcurrent: 1 });

    const [slow, fast] = await Promise.all([client.get(`${base}/drip`), client.get(`${base}/new`)]);

    expect(slow.success).toBe(false);
    expect(fast).toMatchObject({ success: true, status: 200, data: 'moved here' });
  }, 5000);
});
