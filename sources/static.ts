import type { StaticSourceConfig } from "../common/config.ts";
import type { DnsSource, Endpoint } from "../common/contract.ts";
import { SplitByIPVersion } from "../common/endpoints.ts";

/** Desired records written out in the configuration file */
export class StaticSource implements DnsSource {

  constructor(
    public config: StaticSourceConfig,
  ) {}

  Endpoints() {
    const endpoints = new Array<Endpoint>();

    for (const rule of this.config.endpoints) {
      if (!rule.targets.length) continue;
      const endpoint: Endpoint = {
        DNSName: rule.dnsName,
        RecordType: rule.recordType,
        Targets: rule.targets,
        Labels: {
          'external-dns/resource': `static/${rule.dnsName}`,
        },
        ...(rule.recordTTL ? { RecordTTL: rule.recordTTL } : {}),
      };

      // Mixed address families are easy to write down but need two records
      if (endpoint.RecordType === 'A') {
        endpoints.push(...SplitByIPVersion(endpoint));
      } else {
        endpoints.push(endpoint);
      }
    }

    return Promise.resolve(endpoints);
  }

}
