import type { ProviderConfig, SourceConfig } from "../common/config.ts";
import type { DnsProvider, DnsSource } from "../common/contract.ts";
import type { ProviderOptions } from "../providers/adapter-provider.ts";

import { StaticSource } from '../sources/static.ts';

import { PiholeProvider } from '../providers/pihole/mod.ts';
import { VultrProvider } from '../providers/vultr/mod.ts';

export function source(source: SourceConfig): DnsSource {
  switch (source.type) {
    case 'static':
      return new StaticSource(source);
  }
};

export async function provider(
  provider: ProviderConfig,
  opts: ProviderOptions,
  signal?: AbortSignal,
): Promise<DnsProvider & { config: ProviderConfig }> {
  switch (provider.type) {
    case 'pihole':
      return await PiholeProvider.connect(provider, opts, signal);
    case 'vultr':
      return new VultrProvider(provider, undefined, opts);
  }
};
