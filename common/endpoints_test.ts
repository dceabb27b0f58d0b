import { expect, test } from "vitest";

import { describeEndpoint, entryKey, sameTargetSet, SplitByIPVersion, sortedUniqueTargets } from "./endpoints.ts";

test('Endpoint SplitByIPVersion: Dualstack targets', () => {
  verifySplitByIPVersion({
    inputTargets: ['127.0.0.1', '::1', '::2'],
    expectedIPv4Targets: ['127.0.0.1'],
    expectedIPv6Targets: ['::1', '::2'],
  });

  verifySplitByIPVersion({
    inputTargets: ['::1', '127.0.0.1'],
    expectedIPv4Targets: ['127.0.0.1'],
    expectedIPv6Targets: ['::1'],
  });
});

test('Endpoint SplitByIPVersion: IPv4-only targets', () => {
  verifySplitByIPVersion({
    inputTargets: ['1.1.1.1', '2.2.2.2'],
    expectedIPv4Targets: ['1.1.1.1', '2.2.2.2'],
    expectedIPv6Targets: [],
  });
});

test('Endpoint SplitByIPVersion: Zero targets', () => {
  verifySplitByIPVersion({
    inputTargets: [],
    expectedIPv4Targets: [],
    expectedIPv6Targets: [],
  });
});

test('Entry keys pair records by name and type', () => {
  expect(entryKey({ DNSName: 'a.example.com', RecordType: 'A' }))
    .toBe(entryKey({ DNSName: 'a.example.com', RecordType: 'A' }));
  expect(entryKey({ DNSName: 'a.example.com', RecordType: 'A' }))
    .not.toBe(entryKey({ DNSName: 'a.example.com', RecordType: 'AAAA' }));
  expect(entryKey({ DNSName: 'A.Example.com.', RecordType: 'A' }))
    .toBe(entryKey({ DNSName: 'a.example.com', RecordType: 'A' }));
});

test('Target sets ignore order and duplicates', () => {
  expect(sortedUniqueTargets(['b', 'a', 'b'])).toEqual(['a', 'b']);
  expect(sameTargetSet(['2.2.2.2', '1.1.1.1'], ['1.1.1.1', '2.2.2.2', '1.1.1.1'])).toBe(true);
  expect(sameTargetSet(['1.1.1.1'], ['1.1.1.1', '2.2.2.2'])).toBe(false);
});

test('Endpoints describe themselves on one line', () => {
  expect(describeEndpoint({
    DNSName: 'www.example.com',
    RecordType: 'A',
    Targets: ['1.1.1.1', '2.2.2.2'],
  })).toBe('www.example.com IN A -> 1.1.1.1, 2.2.2.2');
});


/**
 * Helper to assert SplitByIPVersion's splitting behavior
 */
function verifySplitByIPVersion(opts: {
  inputTargets: string[],
  expectedIPv4Targets: string[],
  expectedIPv6Targets: string[],
}) {
  const splitEndpoints = SplitByIPVersion({
    DNSName: 'example.com',
    RecordType: 'A',
    Targets: opts.inputTargets,
  });

  // Check number of resulting endpoints
  const expectedCount = [opts.expectedIPv4Targets, opts.expectedIPv6Targets]
    .map<number>(x => x.length > 0 ? 1 : 0)
    .reduce((a,b) => a+b, 0);
  expect(splitEndpoints, 'Wrong number of endpoints emitted').toHaveLength(expectedCount);

  if (opts.expectedIPv4Targets.length > 0) {
    const v4Endpoints = splitEndpoints.filter(x => x.RecordType === 'A');
    expect(v4Endpoints).toHaveLength(1);
    expect(v4Endpoints[0].Targets).toEqual(opts.expectedIPv4Targets);
  }

  if (opts.expectedIPv6Targets.length > 0) {
    const v6Endpoints = splitEndpoints.filter(x => x.RecordType === 'AAAA');
    expect(v6Endpoints).toHaveLength(1);
    expect(v6Endpoints[0].Targets).toEqual(opts.expectedIPv6Targets);
  }
}
