import type { ApplyReport, ChangeSet, Endpoint } from "../common/contract.ts";
import type { DomainFilter } from "../common/domain-filter.ts";
import {
  entryKey, sameTargetSet, sortedUniqueTargets,
  SingleTargetRecordTypes,
} from "../common/endpoints.ts";
import { SoftError } from "../common/errors.ts";
import { log } from "../common/logging.ts";

/** Backend-specific translation between Endpoints and the backend's own records */
export interface RecordAdapter {
  readonly name: string;
  /**
   * Whether the backend keeps every target of a (name, type) pair as one record group.
   * Grouping backends get their updates merged per key and compared as whole target sets;
   * the others get every target treated as a record of its own.
   */
  readonly groupsTargets: boolean;
  readonly supportsWildcards: boolean;
  readonly recordTypes: ReadonlySet<string>;

  /** Refreshes whatever backend state the other calls rely on (zones, record IDs) */
  prepare?(signal?: AbortSignal): Promise<void>;
  listRecords(recordType: string, signal?: AbortSignal): Promise<Array<Endpoint>>;
  createTarget(endpoint: Endpoint, target: string, signal?: AbortSignal): Promise<void>;
  deleteTarget(endpoint: Endpoint, target: string, signal?: AbortSignal): Promise<void>;
}

type Action = 'create' | 'delete';

/**
 * Turns a ChangeSet into backend calls.
 * Holds nothing between apply() calls.
 */
export class ChangeReconciler {
  constructor(
    private readonly adapter: RecordAdapter,
    private readonly domainFilter: DomainFilter,
    private readonly opts: { dryRun?: boolean } = {},
  ) {}

  async apply(changes: ChangeSet, signal?: AbortSignal): Promise<ApplyReport> {
    const report: ApplyReport = { calls: 0, skipped: 0, softErrors: [] };

    // Handle pure deletes first.
    for (const endpoint of changes.Delete) {
      await this.applyRecord('delete', endpoint, report, signal);
    }

    // There is no updating in place: changed records get deleted, then created again.
    const updateNew = this.groupUpdates(changes.UpdateNew);
    for (const before of this.explode(changes.UpdateOld)) {
      const candidates = updateNew.get(entryKey(before));
      if (!candidates?.length) {
        log.warn(`No desired record pairs with ${before.DNSName} ${before.RecordType}; leaving it in place`);
        continue;
      }

      const sameIdx = candidates.findIndex(after => this.isUnchanged(before, after));
      if (sameIdx >= 0) {
        log.debug(`Unchanged: ${before.DNSName} IN ${before.RecordType}`);
        candidates.splice(sameIdx, 1);
        continue;
      }
      // A replacement that will be refused must not cost us the current record.
      if (candidates.every(after => this.unsupportedShape(after) != null)) {
        log.warn(`Keeping ${before.DNSName} ${before.RecordType}: its replacement cannot be created`);
        continue;
      }
      await this.applyRecord('delete', before, report, signal);
    }

    // Handle pure creates before applying new updated state.
    for (const endpoint of changes.Create) {
      await this.applyRecord('create', endpoint, report, signal);
    }
    for (const endpoint of Array.from(updateNew.values()).flat()) {
      await this.applyRecord('create', endpoint, report, signal);
    }

    return report;
  }

  private groupUpdates(updates: Array<Endpoint>) {
    const byKey = new Map<string, Array<Endpoint>>();
    for (const endpoint of this.explode(updates)) {
      const key = entryKey(endpoint);
      const existing = byKey.get(key);

      if (!this.adapter.groupsTargets) {
        if (existing) existing.push(endpoint);
        else byKey.set(key, [endpoint]);
        continue;
      }

      byKey.set(key, [{
        ...(existing?.[0] ?? endpoint),
        Targets: sortedUniqueTargets([...(existing?.[0]?.Targets ?? []), ...endpoint.Targets]),
      }]);
    }
    return byKey;
  }

  /**
   * For backends without target groups, every target is its own record.
   * Single-target types stay whole so that extra targets get refused.
   */
  private explode(endpoints: Array<Endpoint>) {
    if (this.adapter.groupsTargets) return endpoints;
    return endpoints.flatMap(endpoint =>
      endpoint.Targets.length > 1 && !SingleTargetRecordTypes.has(endpoint.RecordType)
        ? endpoint.Targets.map(target => ({ ...endpoint, Targets: [target] }))
        : [endpoint]);
  }

  /** Why the backend cannot hold this record, if it cannot */
  private unsupportedShape({ DNSName, RecordType, Targets }: Endpoint) {
    if (!this.adapter.supportsWildcards && DNSName.includes('*')) {
      return `UNSUPPORTED: ${this.adapter.name} DNS names cannot be wildcards`;
    }
    if (SingleTargetRecordTypes.has(RecordType) && Targets.length > 1) {
      return `UNSUPPORTED: ${this.adapter.name} ${RecordType} records cannot have multiple targets`;
    }
    return null;
  }

  private isUnchanged(before: Endpoint, after: Endpoint) {
    if (this.adapter.groupsTargets) {
      return sameTargetSet(before.Targets, after.Targets);
    }
    return before.Targets[0] === after.Targets[0];
  }

  private async applyRecord(action: Action, endpoint: Endpoint, report: ApplyReport, signal?: AbortSignal) {
    const { DNSName, RecordType, Targets } = endpoint;

    if (!this.domainFilter.Match(DNSName)) {
      log.debug(`Skipping: ${action} ${DNSName} that does not match domain filter`);
      report.skipped++;
      return;
    }
    if (!this.adapter.recordTypes.has(RecordType)) {
      log.warn(`Skipping: unsupported endpoint ${DNSName} ${RecordType} ${Targets.join(',')}`);
      report.skipped++;
      return;
    }
    if (Targets.length === 0) {
      log.info(`Skipping: missing targets ${action} ${DNSName} ${RecordType}`);
      report.skipped++;
      return;
    }

    const unsupported = this.unsupportedShape(endpoint);
    if (unsupported) {
      this.reportSoftError(report, endpoint, unsupported);
      return;
    }

    // Each target is attempted even when a sibling target fails.
    const failures = new Array<unknown>();
    for (const target of Targets) {
      signal?.throwIfAborted();
      report.calls++;
      if (this.opts.dryRun) {
        log.info(`DRY RUN: ${action} ${DNSName} IN ${RecordType} -> ${target}`);
        continue;
      }

      log.info(`${action} ${DNSName} IN ${RecordType} -> ${target}`);
      try {
        if (action == 'create') {
          await this.adapter.createTarget(endpoint, target, signal);
        } else {
          await this.adapter.deleteTarget(endpoint, target, signal);
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        log.error(`Failed to ${action} ${DNSName} IN ${RecordType} -> ${target}`, { err });
        failures.push(err);
      }
    }

    if (failures.length == 1) throw failures[0];
    if (failures.length > 1) throw new AggregateError(failures,
      `${failures.length} targets of ${DNSName} ${RecordType} failed to ${action}`);
  }

  private reportSoftError(report: ApplyReport, endpoint: Endpoint, message: string) {
    const error = new SoftError(message, endpoint);
    log.warn(`${message}: ${endpoint.DNSName}`, { targets: endpoint.Targets });
    report.softErrors.push(error);
  }
}
