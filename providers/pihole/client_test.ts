import { afterEach, beforeEach, expect, test, vi } from "vitest";

import { BackendError, ConfigurationError, TokenRenewalExhaustedError } from "../../common/errors.ts";
import { PiholeClient } from "./client.ts";
import { PiholeServerMock } from "./mock.ts";

let server: PiholeServerMock;
beforeEach(() => {
  server = new PiholeServerMock('test-secret');
  vi.stubGlobal('fetch', server.fetch);
});
afterEach(() => {
  vi.unstubAllGlobals();
});

function connect() {
  return PiholeClient.connect({ server: 'http://pihole.test', password: 'test-secret' });
}

test('client without a server is a configuration error', () => {
  expect(() => new PiholeClient({ password: 'test-secret' }))
    .toThrow(new ConfigurationError('no Pi-hole server found in the configuration'));
  expect(() => new PiholeClient({ server: 'not a url' }))
    .toThrow(ConfigurationError);
});

test('client signs in while connecting', async () => {
  const client = await connect();
  expect(client.hasToken).toBe(true);
  expect(server.callLines()).toEqual(['POST /api/auth']);
});

test('client without a password never signs in', async () => {
  const client = await PiholeClient.connect({ server: 'http://pihole.test' });
  expect(client.hasToken).toBe(false);
  expect(server.calls).toEqual([]);
});

test('client sends the session id', async () => {
  const client = await connect();
  await client.request({ path: '/api/config/dns/hosts' });
  expect(server.calls[1]).toEqual({
    method: 'GET',
    path: '/api/config/dns/hosts',
    sid: 'mock-sid-1',
  });
});

test('client refuses a wrong password', async () => {
  const failure = PiholeClient.connect({ server: 'http://pihole.test', password: 'wrong-secret' });
  await expect(failure).rejects.toBeInstanceOf(BackendError);
  await expect(failure).rejects.toMatchObject({ status: 401, key: 'unauthorized' });
});

test('expired session is renewed once and the call retried', async () => {
  const client = await connect();
  server.expireSessions();

  const data = await client.request({ path: '/api/config/dns/hosts' });
  expect(data).toEqual({ config: { dns: { hosts: [] } }, took: 0.002 });
  expect(server.callLines()).toEqual([
    'POST /api/auth',
    'GET /api/config/dns/hosts',
    'GET /api/auth',
    'POST /api/auth',
    'GET /api/config/dns/hosts',
  ]);
  expect(server.calls[4].sid).toBe('mock-sid-2');
});

test('401 with a session reported valid is still retried', async () => {
  const client = await connect();
  server.respondNext('GET', '/api/config/dns/hosts', 401,
    { error: { key: 'unauthorized', message: 'Unauthorized', hint: null }, took: 0 });

  await client.request({ path: '/api/config/dns/hosts' });
  expect(server.callLines()).toEqual([
    'POST /api/auth',
    'GET /api/config/dns/hosts',
    'GET /api/auth',
    'GET /api/config/dns/hosts',
  ]);
});

test('renewal gives up after three attempts', async () => {
  const client = await connect();
  for (let i = 0; i < 4; i++) {
    server.respondNext('GET', '/api/config/dns/hosts', 401,
      { error: { key: 'unauthorized', message: 'Unauthorized', hint: null }, took: 0 });
  }

  await expect(client.request({ path: '/api/config/dns/hosts' }))
    .rejects.toThrow(new TokenRenewalExhaustedError('pihole', 3));
  expect(server.callLines().filter(x => x == 'GET /api/config/dns/hosts')).toHaveLength(4);
});

test('concurrent calls share one renewal', async () => {
  const client = await connect();
  server.expireSessions();

  await Promise.all([
    client.request({ path: '/api/config/dns/hosts' }),
    client.request({ path: '/api/config/dns/cnameRecords' }),
  ]);
  expect(server.callLines().filter(x => x == 'POST /api/auth')).toHaveLength(2);
});

test('a cancelled caller leaves the shared renewal to the others', async () => {
  const client = await connect();
  server.expireSessions();
  const release = server.holdSignIns();

  const ctrl = new AbortController();
  const cancelled = expect(client.request({ path: '/api/config/dns/hosts', signal: ctrl.signal }))
    .rejects.toThrow('This operation was aborted');
  const other = client.request({ path: '/api/config/dns/cnameRecords' });

  // Both calls are waiting on the same pending sign-in.
  await vi.waitFor(() => {
    expect(server.callLines().filter(x => x == 'GET /api/auth')).toHaveLength(2);
  });
  await new Promise(resolve => setTimeout(resolve, 20));

  ctrl.abort();
  await cancelled;
  release();

  await expect(other).resolves.toEqual({ config: { dns: { cnameRecords: [] } }, took: 0.002 });
  expect(server.callLines().filter(x => x == 'POST /api/auth')).toHaveLength(2);
  expect(server.calls[server.calls.length - 1]).toEqual({
    method: 'GET',
    path: '/api/config/dns/cnameRecords',
    sid: 'mock-sid-2',
  });
});

test('server path is kept in front of API paths', async () => {
  const urls = new Array<string>();
  vi.stubGlobal('fetch', (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(input instanceof Request ? input.url : input);
    urls.push(url.href);
    url.pathname = url.pathname.replace(/^\/admin/, '');
    return server.fetch(url, init);
  });

  const client = await PiholeClient.connect({ server: 'http://pihole.test/admin/', password: 'test-secret' });
  await client.request({ path: '/api/config/dns/hosts' });
  expect(urls).toEqual([
    'http://pihole.test/admin/api/auth',
    'http://pihole.test/admin/api/config/dns/hosts',
  ]);
});

test('deleting a missing entry succeeds', async () => {
  const client = await connect();
  await expect(client.request({
    method: 'DELETE',
    path: `/api/config/dns/hosts/${encodeURIComponent('1.2.3.4 gone.example.com')}`,
  })).resolves.toBeNull();
});

test('adding a present entry succeeds', async () => {
  const client = await connect();
  server.lines.hosts.push('1.2.3.4 www.example.com');
  await expect(client.request({
    method: 'PUT',
    path: `/api/config/dns/hosts/${encodeURIComponent('1.2.3.4 www.example.com')}`,
  })).resolves.toBeNull();
  expect(server.lines.hosts).toEqual(['1.2.3.4 www.example.com']);
});

test('other failures carry the error envelope', async () => {
  const client = await connect();
  server.respondNext('PUT', '/api/config/dns/hosts/bad', 400, {
    error: { key: 'bad_request', message: 'Invalid request', hint: 'Specify a name' },
    took: 0.003,
  });

  await expect(client.request({ method: 'PUT', path: '/api/config/dns/hosts/bad' }))
    .rejects.toThrow('received 400 status code from pihole: [bad_request] Invalid request (Specify a name) - 0.003s');
});

test('cancelled calls are not sent', async () => {
  const client = await connect();
  const ctrl = new AbortController();
  ctrl.abort();

  await expect(client.request({ path: '/api/config/dns/hosts', signal: ctrl.signal }))
    .rejects.toThrow('This operation was aborted');
  expect(server.callLines()).toEqual(['POST /api/auth']);
});
