import { createInterface } from "node:readline/promises";

import type { ApplyReport, ChangeSet, DnsSource, Endpoint } from "../common/contract.ts";
import { describeEndpoint } from "../common/endpoints.ts";
import { log } from "../common/logging.ts";

export function printTick(tickVia: string | undefined) {
  log.info(`Sync triggered at ${new Date().toISOString()} by ${tickVia ?? 'schedule'}`);
}

export async function loadSourceEndpoints(sources: Array<DnsSource>) {
  log.debug(`Loading desired records from ${sources.length} sources...`);
  const sourceRecords = await Promise.all(sources.map(async source => {
    const endpoints = await source.Endpoints().catch((err: unknown) => {
      log.error(`Source "${source.config.type}" failed to list Endpoints`);
      throw err;
    });
    log.info(`Discovered ${endpoints.length} desired records from ${source.config.type}`);
    return endpoints;
  })).then(x => x.flat());
  log.debug(`Discovered ${sourceRecords.length} desired records overall`);
  return sourceRecords;
}

/** One line per planned change, for display before confirming */
export function formatChanges(changes: ChangeSet) {
  const lines = new Array<string>();
  const push = (prefix: string, list: Array<Endpoint>) => {
    for (const endpoint of list) {
      lines.push(`    ${prefix} ${describeEndpoint(endpoint)}`);
    }
  };
  push('create', changes.Create);
  push('replace before', changes.UpdateOld);
  push('replace after', changes.UpdateNew);
  push('delete', changes.Delete);
  return lines;
}

export function printChanges(changes: ChangeSet) {
  const lines = formatChanges(changes);
  // Deletions deserve a louder line.
  const level = changes.Delete.length > 0 ? 'warn' : 'info';
  log[level](`Planned ${changes.summary()}:\n${lines.join('\n')}`);
}

export function printReport(providerId: string, report: ApplyReport) {
  log.info(`Provider ${providerId} took ${report.calls} calls, skipped ${report.skipped} records`);
  for (const softError of report.softErrors) {
    log.warn(`Could not apply ${describeEndpoint(softError.endpoint)}: ${softError.message}`);
  }
}

export async function confirmBeforeApplyingChanges(flags: { yes: boolean }, signal?: AbortSignal) {
  if (flags.yes) return true;

  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const result = await prompt.question(`==> Proceed with editing provider records? [no] `, { signal });
    if (result.trim() !== 'yes') {
      log.warn(`User declined to perform provider edits`);
      return false;
    }
    return true;
  } finally {
    prompt.close();
  }
}
