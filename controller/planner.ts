import { ChangeSet, type Endpoint } from "../common/contract.ts";
import type { DomainFilter } from "../common/domain-filter.ts";
import { normalizeDomain } from "../common/domain-filter.ts";
import { sameTargetSet, sortedUniqueTargets } from "../common/endpoints.ts";
import { log } from "../common/logging.ts";
import { union } from "../common/set-util.ts";

export type Policy = 'sync' | 'upsert-only';

interface NameRecords {
  source: Endpoint[];
  existing: Endpoint[];
}

export class Planner {
  constructor(
    private readonly domainFilter: DomainFilter,
    private readonly policy: Policy = 'upsert-only',
  ) {}

  PlanChanges(sourceRecords: Endpoint[], existingRecords: Endpoint[]): ChangeSet {
    const changes = new ChangeSet();

    const recordsByName = new Map<string, NameRecords>();
    function getByName(name: string) {
      const key = normalizeDomain(name);
      let records = recordsByName.get(key);
      if (!records) {
        records = { source: [], existing: [] };
        recordsByName.set(key, records);
      }
      return records;
    }

    for (const sourceRecord of sourceRecords) {
      if (!this.domainFilter.Match(sourceRecord.DNSName)) continue;
      getByName(sourceRecord.DNSName).source.push(sourceRecord);
    }
    for (const existingRecord of existingRecords) {
      getByName(existingRecord.DNSName).existing.push(existingRecord);
    }

    for (const [name, records] of recordsByName) {
      const sourceTypes = new Set(records.source.map(x => x.RecordType));
      const existingTypes = new Set(records.existing.map(x => x.RecordType));

      // A CNAME cannot share its name with anything else
      if (sourceTypes.has('CNAME') && union(sourceTypes, existingTypes).size > 1) {
        log.warn(`For ${name}, a CNAME would clash with other records; leaving the name alone`);
        continue;
      }

      for (const type of union(sourceTypes, existingTypes)) {
        const desired = records.source.filter(x => x.RecordType === type);
        const actual = records.existing.filter(x => x.RecordType === type);

        if (desired.length === 0) {
          if (this.policy === 'sync') changes.Delete.push(...actual);
          continue;
        }

        const merged: Endpoint = {
          ...desired[0],
          DNSName: actual[0]?.DNSName ?? desired[0].DNSName,
          Targets: sortedUniqueTargets(desired.flatMap(x => x.Targets)),
        };
        if (actual.length === 0) {
          changes.Create.push(merged);
          continue;
        }

        if (sameTargetSet(merged.Targets, actual.flatMap(x => x.Targets))) continue;
        changes.UpdateOld.push(...actual);
        changes.UpdateNew.push(merged);
      }
    }

    return changes;
  }
}
