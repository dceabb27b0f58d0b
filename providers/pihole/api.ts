import { isIPv4, isIPv6 } from "node:net";
import { z } from "zod";

import type { Endpoint } from "../../common/contract.ts";
import { log } from "../../common/logging.ts";

export const AuthResponse = z.object({
  session: z.object({
    valid: z.boolean(),
    totp: z.boolean().optional(),
    sid: z.string().nullish(),
    validity: z.number().optional(),
    message: z.string().nullish(),
  }),
  took: z.number().optional(),
});
export type AuthResponse = z.infer<typeof AuthResponse>;

export const ErrorResponse = z.object({
  error: z.object({
    key: z.string(),
    message: z.string(),
    hint: z.string().nullish(),
  }),
  took: z.number().optional(),
});
export type ErrorResponse = z.infer<typeof ErrorResponse>;

export const ConfigResponse = z.object({
  config: z.object({
    dns: z.object({
      hosts: z.array(z.string()).optional(),
      cnameRecords: z.array(z.string()).optional(),
    }),
  }),
  took: z.number().optional(),
});
export type ConfigResponse = z.infer<typeof ConfigResponse>;

export const PiholeRecordTypes: ReadonlySet<string> = new Set(['A', 'AAAA', 'CNAME']);

/** Config element holding the given record type */
export function recordElement(recordType: string): 'hosts' | 'cnameRecords' {
  switch (recordType) {
    case 'A':
    case 'AAAA':
      return 'hosts';
    case 'CNAME':
      return 'cnameRecords';
    default:
      throw new Error(`Pi-hole does not store ${recordType} records`);
  }
}

export function listingPath(recordType: string) {
  return `/api/config/dns/${recordElement(recordType)}`;
}

/** The path adding or removing one target of an endpoint */
export function recordPath(endpoint: Endpoint, target: string) {
  const element = recordElement(endpoint.RecordType);
  const entry = element == 'hosts'
    ? `${target} ${endpoint.DNSName}`
    : [endpoint.DNSName, target, ...(endpoint.RecordTTL ? [endpoint.RecordTTL] : [])].join(',');
  return `/api/config/dns/${element}/${encodeURIComponent(entry)}`;
}

/**
 * Turns the config lines of one record type into Endpoints.
 * Host lines are `<ip> <name>`, CNAME lines are `<name>,<target>[,<ttl>]`.
 * Lines for the same name are folded together, in listing order.
 */
export function parseRecordLines(recordType: string, lines: Array<string>): Array<Endpoint> {
  const byName = new Map<string, Endpoint>();

  for (const line of lines) {
    const fields = line.split(/[ ,]/).filter(x => x !== '');
    if (fields.length < 2) {
      log.warn(`skipping record ${JSON.stringify(line)}: invalid format received from Pi-hole`);
      continue;
    }

    let [target, dnsName] = fields;
    let ttl: number | undefined;
    switch (recordType) {
      case 'A':
        if (!isIPv4(target)) continue;
        break;
      case 'AAAA':
        if (!isIPv6(target)) continue;
        break;
      case 'CNAME':
        [dnsName, target] = fields;
        if (fields.length == 3) {
          ttl = parseTTL(fields[2]);
          if (ttl === undefined) {
            log.warn(`failed to parse TTL value received from Pi-hole; leaving it unset`, { line });
          }
        }
        break;
    }

    const existing = byName.get(dnsName);
    if (existing) {
      existing.Targets.push(target);
      continue;
    }
    byName.set(dnsName, {
      DNSName: dnsName,
      RecordType: recordType,
      Targets: [target],
      ...(ttl ? { RecordTTL: ttl } : {}),
    });
  }

  return Array.from(byName.values());
}

function parseTTL(raw: string) {
  if (!/^-?\d+$/.test(raw)) return undefined;
  return Number.parseInt(raw, 10);
}
