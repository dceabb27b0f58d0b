import type { ApplyReport, ChangeSet, DnsProvider, Endpoint } from "../common/contract.ts";
import { log } from "../common/logging.ts";
import { printChanges, printReport } from "./output.ts";
import { Planner, type Policy } from "./planner.ts";

export interface SyncOptions {
  policy: Policy;
  /** Asked before anything is submitted; declining skips the provider for this tick */
  confirm: (changes: ChangeSet) => Promise<boolean>;
  signal?: AbortSignal;
}

/** Brings one provider in line with the desired records. Null when nothing was submitted. */
export async function syncProvider(
  providerId: string,
  provider: DnsProvider,
  sourceRecords: Array<Endpoint>,
  opts: SyncOptions,
): Promise<ApplyReport | null> {
  log.debug(`Loading existing records from ${providerId}...`);
  const existing = await provider.Records(opts.signal);
  log.info(`Found ${existing.length} existing records in ${providerId}`);

  const planner = new Planner(provider.domainFilter, opts.policy);
  const changes = planner.PlanChanges(sourceRecords, existing);
  if (changes.length() === 0) {
    log.info(`Provider ${providerId} has no necessary changes.`);
    return null;
  }

  printChanges(changes);
  if (!await opts.confirm(changes)) return null;

  log.info(`Submitting ${changes.summary()} to ${providerId} ...`);
  const report = await provider.ApplyChanges(changes, opts.signal);
  printReport(providerId, report);
  log.info(`Provider ${providerId} is now up to date.`);
  return report;
}
