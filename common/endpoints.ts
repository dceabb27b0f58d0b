import { isIPv6 } from "node:net";
import type { Endpoint } from "./contract.ts";
import { normalizeDomain } from "./domain-filter.ts";

/** Record types which carry a single target per name */
export const SingleTargetRecordTypes: ReadonlySet<string> = new Set(['CNAME']);

/// Basic function for non-special cases
export function SplitOutTarget(self: Endpoint, predicate: (t: string) => boolean): [Endpoint, Endpoint] {
  return [{
    ...self,
    Targets: self.Targets.filter(predicate),
  }, {
    ...self,
    Targets: self.Targets.filter(x => !predicate(x)),
  }];
}

export function SplitByIPVersion(all: Endpoint): Endpoint[] {
  const [aaaa, a] = SplitOutTarget(all, t => isIPv6(t));
  const endpoints = new Array<Endpoint>();
  if (aaaa.Targets.length > 0) {
    aaaa.RecordType = 'AAAA';
    endpoints.push(aaaa);
  }
  if (a.Targets.length > 0) {
    a.RecordType = 'A';
    endpoints.push(a);
  }
  return endpoints;
}

/** The (name, type) pair which correlates update pairs and groups targets */
export function entryKey(endp: Pick<Endpoint, 'DNSName' | 'RecordType'>) {
  return JSON.stringify([normalizeDomain(endp.DNSName), endp.RecordType]);
}

export function sortedUniqueTargets(targets: Iterable<string>) {
  return Array.from(new Set(targets)).sort();
}

export function sameTargetSet(a: Array<string>, b: Array<string>) {
  const left = sortedUniqueTargets(a);
  const right = sortedUniqueTargets(b);
  return left.length === right.length
    && left.every((target, idx) => target === right[idx]);
}

export function describeEndpoint(endp: Endpoint) {
  return `${endp.DNSName} IN ${endp.RecordType} -> ${endp.Targets.join(', ')}`;
}
