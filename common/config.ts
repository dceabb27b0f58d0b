import { readFile } from "node:fs/promises";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";

import { DomainFilter } from "./domain-filter.ts";
import { ConfigurationError } from "./errors.ts";

/** Keys every provider accepts to scope the names it manages */
const DomainFilterKeys = {
  domain_filter: z.array(z.string()).optional(),
  exclude_domains: z.array(z.string()).optional(),
  regex_domain_filter: z.string().optional(),
  regex_domain_exclusion: z.string().optional(),
};

export const PiholeProviderConfig = z.object({
  type: z.literal('pihole'),
  /** e.g. http://pi.hole */
  server: z.string().optional(),
  /** Falls back to PIHOLE_PASSWORD */
  password: z.string().optional(),
  ...DomainFilterKeys,
});
export type PiholeProviderConfig = z.infer<typeof PiholeProviderConfig>;

export const VultrProviderConfig = z.object({
  type: z.literal('vultr'),
  ...DomainFilterKeys,
});
export type VultrProviderConfig = z.infer<typeof VultrProviderConfig>;

export const ProviderConfig = z.discriminatedUnion('type', [
  PiholeProviderConfig,
  VultrProviderConfig,
]);
export type ProviderConfig = z.infer<typeof ProviderConfig>;

/** Same shape as the endpoints of a DNSEndpoint resource */
export const StaticEndpointConfig = z.object({
  dnsName: z.string().min(1),
  recordType: z.string().min(1),
  targets: z.array(z.string()),
  recordTTL: z.number().int().nonnegative().optional(),
});
export type StaticEndpointConfig = z.infer<typeof StaticEndpointConfig>;

export const StaticSourceConfig = z.object({
  type: z.literal('static'),
  endpoints: z.array(StaticEndpointConfig).default([]),
});
export type StaticSourceConfig = z.infer<typeof StaticSourceConfig>;

export const SourceConfig = z.discriminatedUnion('type', [
  StaticSourceConfig,
]);
export type SourceConfig = z.infer<typeof SourceConfig>;

export const ControllerConfig = z.object({
  interval_seconds: z.number().positive().default(60),
  /** upsert-only never deletes observed records which nothing desires */
  policy: z.enum(['sync', 'upsert-only']).default('upsert-only'),
  source: z.array(SourceConfig).default([]),
  provider: z.array(ProviderConfig).min(1),
});
export type ControllerConfig = z.infer<typeof ControllerConfig>;

export function parseControllerConfig(raw: unknown): ControllerConfig {
  const parsed = ControllerConfig.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(x => `${x.path.join('.') || 'config'}: ${x.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export async function loadControllerConfig(path: string): Promise<ControllerConfig> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = parseToml(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${path} is not valid TOML: ${reason}`);
  }
  return parseControllerConfig(raw);
}

/** Goes through the serialized filter form, so mixed modes are refused in one place */
export function domainFilterFromConfig(config: Omit<VultrProviderConfig, 'type'>) {
  return DomainFilter.fromJSON({
    include: config.domain_filter,
    exclude: config.exclude_domains,
    regexInclude: config.regex_domain_filter,
    regexExclude: config.regex_domain_exclusion,
  });
}
