import { afterEach, beforeEach, expect, test, vi } from "vitest";

import { ChangeSet } from "../../common/contract.ts";
import { ConfigurationError } from "../../common/errors.ts";
import { PiholeServerMock } from "./mock.ts";
import { PiholeProvider } from "./mod.ts";

let server: PiholeServerMock;
beforeEach(() => {
  server = new PiholeServerMock('test-secret');
  vi.stubGlobal('fetch', server.fetch);
});
afterEach(() => {
  vi.unstubAllGlobals();
});

function connect(dryRun = false) {
  return PiholeProvider.connect({
    type: 'pihole',
    server: 'http://pihole.test',
    password: 'test-secret',
    domain_filter: ['example.com'],
  }, { dryRun });
}

/** Calls made after signing in */
function mutations() {
  return server.callLines().filter(x => !x.startsWith('POST /api/auth') && !x.startsWith('GET '));
}

test('pihole provider needs a server', async () => {
  await expect(PiholeProvider.connect({ type: 'pihole' }))
    .rejects.toBeInstanceOf(ConfigurationError);
});

test('pihole provider lists records within its filter', async () => {
  server.lines.hosts.push(
    '192.168.1.10 www.example.com',
    '10.0.0.1 other.org',
    'fd00::10 www.example.com',
    '192.168.1.11 www.example.com');
  server.lines.cnameRecords.push(
    'alias.example.com,www.example.com',
    'ttl.example.com,www.example.com,300');

  const provider = await connect();
  expect(await provider.Records()).toEqual([{
    DNSName: 'www.example.com',
    RecordType: 'A',
    Targets: ['192.168.1.10', '192.168.1.11'],
  }, {
    DNSName: 'www.example.com',
    RecordType: 'AAAA',
    Targets: ['fd00::10'],
  }, {
    DNSName: 'alias.example.com',
    RecordType: 'CNAME',
    Targets: ['www.example.com'],
  }, {
    DNSName: 'ttl.example.com',
    RecordType: 'CNAME',
    Targets: ['www.example.com'],
    RecordTTL: 300,
  }]);
});

test('pihole provider deletes before creating', async () => {
  server.lines.hosts.push('1.2.3.4 app.example.com', '9.9.9.9 old.example.com');
  const provider = await connect();

  const changes = new ChangeSet();
  changes.Create.push({ DNSName: 'new.example.com', RecordType: 'A', Targets: ['8.8.8.8'] });
  changes.UpdateOld.push({ DNSName: 'app.example.com', RecordType: 'A', Targets: ['1.2.3.4'] });
  changes.UpdateNew.push({ DNSName: 'app.example.com', RecordType: 'A', Targets: ['5.6.7.8'] });
  changes.Delete.push({ DNSName: 'old.example.com', RecordType: 'A', Targets: ['9.9.9.9'] });

  const report = await provider.ApplyChanges(changes);
  expect(report).toEqual({ calls: 4, skipped: 0, softErrors: [] });
  expect(mutations()).toEqual([
    'DELETE /api/config/dns/hosts/9.9.9.9 old.example.com',
    'DELETE /api/config/dns/hosts/1.2.3.4 app.example.com',
    'PUT /api/config/dns/hosts/8.8.8.8 new.example.com',
    'PUT /api/config/dns/hosts/5.6.7.8 app.example.com',
  ]);
  expect(server.lines.hosts).toEqual([
    '8.8.8.8 new.example.com',
    '5.6.7.8 app.example.com',
  ]);
});

test('pihole provider merges split updates of one name', async () => {
  const provider = await connect();

  const changes = new ChangeSet();
  changes.UpdateOld.push({ DNSName: 'app.example.com', RecordType: 'A', Targets: ['1.1.1.1', '2.2.2.2'] });
  changes.UpdateNew.push({ DNSName: 'app.example.com', RecordType: 'A', Targets: ['2.2.2.2'] });
  changes.UpdateNew.push({ DNSName: 'app.example.com', RecordType: 'A', Targets: ['1.1.1.1'] });

  const report = await provider.ApplyChanges(changes);
  expect(report.calls).toBe(0);
  expect(mutations()).toEqual([]);
});

test('pihole provider reports unsupported records and continues', async () => {
  const provider = await connect();

  const changes = new ChangeSet();
  changes.Create.push(
    { DNSName: '*.example.com', RecordType: 'A', Targets: ['1.1.1.1'] },
    { DNSName: 'alias.example.com', RecordType: 'CNAME', Targets: ['a.example.com', 'b.example.com'] },
    { DNSName: 'outside.org', RecordType: 'A', Targets: ['1.1.1.1'] },
    { DNSName: 'mail.example.com', RecordType: 'MX', Targets: ['10 mx.example.com'] },
    { DNSName: 'ok.example.com', RecordType: 'CNAME', Targets: ['www.example.com'], RecordTTL: 60 });

  const report = await provider.ApplyChanges(changes);
  expect(report.calls).toBe(1);
  expect(report.skipped).toBe(2);
  expect(report.softErrors.map(x => [x.endpoint.DNSName, x.message])).toEqual([
    ['*.example.com', 'UNSUPPORTED: pihole DNS names cannot be wildcards'],
    ['alias.example.com', 'UNSUPPORTED: pihole CNAME records cannot have multiple targets'],
  ]);
  expect(mutations()).toEqual([
    'PUT /api/config/dns/cnameRecords/ok.example.com,www.example.com,60',
  ]);
});

test('pihole provider in dry-run mode changes nothing', async () => {
  const provider = await connect(true);

  const changes = new ChangeSet();
  changes.Create.push({ DNSName: 'new.example.com', RecordType: 'A', Targets: ['1.1.1.1', '2.2.2.2'] });

  const report = await provider.ApplyChanges(changes);
  expect(report.calls).toBe(2);
  expect(mutations()).toEqual([]);
  expect(server.lines.hosts).toEqual([]);
});

test('pihole provider tries every target before failing', async () => {
  const provider = await connect();
  server.respondNext('PUT', '/api/config/dns/hosts/1.1.1.1 multi.example.com', 500, {
    error: { key: 'internal', message: 'boom', hint: null },
    took: 0.003,
  });

  const changes = new ChangeSet();
  changes.Create.push({ DNSName: 'multi.example.com', RecordType: 'A', Targets: ['1.1.1.1', '2.2.2.2'] });

  await expect(provider.ApplyChanges(changes))
    .rejects.toThrow('received 500 status code from pihole: [internal] boom - 0.003s');
  expect(server.lines.hosts).toEqual(['2.2.2.2 multi.example.com']);
});
