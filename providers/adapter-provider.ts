import type { ApplyReport, ChangeSet, DnsProvider, Endpoint } from "../common/contract.ts";
import type { DomainFilter } from "../common/domain-filter.ts";
import { ChangeReconciler, type RecordAdapter } from "./reconciler.ts";

export interface ProviderOptions {
  /** Log the backend calls instead of issuing them */
  dryRun?: boolean;
}

/** A DnsProvider made of a DomainFilter and the RecordAdapter of one backend */
export class AdapterProvider implements DnsProvider {
  constructor(
    public readonly adapter: RecordAdapter,
    public readonly domainFilter: DomainFilter,
    protected readonly opts: ProviderOptions = {},
  ) {}

  async Records(signal?: AbortSignal): Promise<Array<Endpoint>> {
    await this.adapter.prepare?.(signal);

    // One failed category cancels its siblings, and all of them settle before we return.
    const listing = new AbortController();
    const onAbort = () => listing.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    let results: Array<PromiseSettledResult<Array<Endpoint>>>;
    try {
      results = await Promise.allSettled(Array.from(this.adapter.recordTypes, type =>
        this.adapter.listRecords(type, listing.signal)
          .catch((err: unknown) => {
            listing.abort(err);
            throw err;
          })));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const byName = new Map<string, Array<Endpoint>>();
    for (const result of results) {
      if (result.status == 'rejected') throw result.reason;
      for (const endpoint of result.value) {
        if (!this.domainFilter.Match(endpoint.DNSName)) continue;
        const existing = byName.get(endpoint.DNSName);
        if (existing) existing.push(endpoint);
        else byName.set(endpoint.DNSName, [endpoint]);
      }
    }
    return Array.from(byName.values()).flat();
  }

  async ApplyChanges(changes: ChangeSet, signal?: AbortSignal): Promise<ApplyReport> {
    await this.adapter.prepare?.(signal);
    const reconciler = new ChangeReconciler(this.adapter, this.domainFilter, this.opts);
    return await reconciler.apply(changes, signal);
  }
}
