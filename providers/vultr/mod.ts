import type { Endpoint, Zone } from "../../common/contract.ts";
import type { VultrProviderConfig } from "../../common/config.ts";
import { domainFilterFromConfig } from "../../common/config.ts";
import { normalizeDomain, type DomainFilter } from "../../common/domain-filter.ts";
import { log } from "../../common/logging.ts";
import { AdapterProvider, type ProviderOptions } from "../adapter-provider.ts";
import type { RecordAdapter } from "../reconciler.ts";
import { VultrApi, type DnsRecord, type VultrApiSurface } from "./api.ts";

export class VultrProvider extends AdapterProvider {
  constructor(
    public readonly config: VultrProviderConfig,
    api: VultrApiSurface = new VultrApi(),
    opts?: ProviderOptions,
  ) {
    const domainFilter = domainFilterFromConfig(config);
    super(new VultrAdapter(api, domainFilter), domainFilter, opts);
  }
}

interface ZoneRecord extends DnsRecord {
  zone: Zone;
  dnsName: string;
  target: string;
}

/**
 * Records of the Vultr DNS zones within our domain filter.
 * Every target is a separate record with its own ID.
 */
export class VultrAdapter implements RecordAdapter {
  readonly name = 'vultr';
  readonly groupsTargets = false;
  readonly supportsWildcards = true;
  readonly recordTypes: ReadonlySet<string> = new Set(['A', 'AAAA', 'CNAME', 'TXT', 'NS']);

  #zones = new Array<Zone>();
  #records = new Array<ZoneRecord>();

  constructor(
    private readonly api: VultrApiSurface,
    private readonly domainFilter: DomainFilter,
  ) {}

  /** Takes a fresh snapshot of zones and their records */
  async prepare(signal?: AbortSignal) {
    const zones = new Array<Zone>();
    for await (const { domain } of this.api.listAllZones(signal)) {
      if (!this.domainFilter.Match(domain) && !this.domainFilter.MatchParent(domain)) continue;
      zones.push({ DNSName: domain, ZoneID: domain });
    }

    const records = new Array<ZoneRecord>();
    for (const zone of zones) {
      for await (const record of this.api.listAllRecords(zone.ZoneID, signal)) {
        records.push({
          ...record,
          zone,
          dnsName: record.name ? `${record.name}.${zone.DNSName}` : zone.DNSName,
          target: record.type === 'TXT' ? record.data.slice(1, -1) : record.data,
        });
      }
    }

    log.debug(`Found ${records.length} records in ${zones.length} Vultr zones`);
    this.#zones = zones;
    this.#records = records;
  }

  listRecords(recordType: string): Promise<Array<Endpoint>> {
    const byName = new Map<string, Endpoint>();
    for (const record of this.#records) {
      if (record.type !== recordType) continue;
      const existing = byName.get(record.dnsName);
      if (existing) {
        existing.Targets.push(record.target);
        continue;
      }
      byName.set(record.dnsName, {
        DNSName: record.dnsName,
        RecordType: record.type,
        Targets: [record.target],
        ...(record.ttl > 0 ? { RecordTTL: record.ttl } : {}),
      });
    }
    return Promise.resolve(Array.from(byName.values()));
  }

  async createTarget(endpoint: Endpoint, target: string, signal?: AbortSignal) {
    const zone = this.findZoneForName(endpoint.DNSName);
    if (!zone) throw new Error(`Vultr has no zone for ${endpoint.DNSName}`);

    const fqdn = endpoint.DNSName.trim().toLowerCase().replace(/\.$/, '');
    const created = await this.api.createRecord(zone.ZoneID, {
      name: fqdn == zone.DNSName ? '' : fqdn.slice(0, -zone.DNSName.length - 1),
      type: endpoint.RecordType,
      data: endpoint.RecordType === 'TXT' ? `"${target}"` : target,
      ttl: endpoint.RecordTTL,
    }, signal);
    this.#records.push({ ...created, zone, dnsName: endpoint.DNSName, target });
  }

  async deleteTarget(endpoint: Endpoint, target: string, signal?: AbortSignal) {
    const dnsName = normalizeDomain(endpoint.DNSName);
    const idx = this.#records.findIndex(x =>
      normalizeDomain(x.dnsName) === dnsName
      && x.type === endpoint.RecordType
      && x.target === target);
    if (idx < 0) {
      log.debug(`Vultr record ${endpoint.DNSName} ${endpoint.RecordType} ${target} is already gone`);
      return;
    }

    const [record] = this.#records.splice(idx, 1);
    await this.api.deleteRecord(record.zone.ZoneID, record.id, signal);
  }

  /** The most specific zone holding the name */
  private findZoneForName(name: string) {
    const dnsName = normalizeDomain(name);
    const matches = this.#zones.filter(zone => {
      const zoneName = normalizeDomain(zone.DNSName);
      return dnsName == zoneName || dnsName.endsWith(`.${zoneName}`);
    });
    return matches.sort((a, b) => b.DNSName.length - a.DNSName.length)[0];
  }
}
