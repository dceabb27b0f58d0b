#!/usr/bin/env tsx
import { loadControllerConfig } from "../common/config.ts";
import { log, setupLogs } from "../common/logging.ts";
import * as configure from "./configure.ts";
import { confirmBeforeApplyingChanges, loadSourceEndpoints, printTick } from "./output.ts";
import { syncProvider } from "./sync.ts";
import { createTicks } from "./ticks.ts";

const args = process.argv.slice(2);
const flags = {
  once: args.includes('--once'),
  dryRun: args.includes('--dry-run'),
  yes: args.includes('--yes'),
  debug: args.includes('--debug'),
  logAsJson: args.includes('--log-as-json'),
};
const configPath = args.find(x => !x.startsWith('--')) ?? 'config.toml';

setupLogs({
  logLevel: flags.debug ? 'debug' : 'info',
  logFormat: flags.logAsJson ? 'json' : 'console',
});

const shutdown = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    log.warn(`Received ${signal}, stopping after the current call`);
    shutdown.abort(new Error(`received ${signal}`));
  });
}

async function main() {
  const config = await loadControllerConfig(configPath);
  log.debug(`Parsed configuration from ${configPath}`, {
    sources: config.source.map(x => x.type),
    providers: config.provider.map(x => x.type),
    policy: config.policy,
  });

  const sources = config.source.map(configure.source);
  const providers = await Promise.all(config.provider.map(x =>
    configure.provider(x, { dryRun: flags.dryRun }, shutdown.signal)));

  // Main loop
  for await (const tickReason of createTicks(config, { once: flags.once, signal: shutdown.signal })) {
    printTick(tickReason);

    const sourceRecords = await loadSourceEndpoints(sources);

    for (const provider of providers) {
      await syncProvider(provider.config.type, provider, sourceRecords, {
        policy: config.policy,
        signal: shutdown.signal,
        confirm: () => flags.dryRun
          ? Promise.resolve(true)
          : confirmBeforeApplyingChanges(flags, shutdown.signal),
      });
    }
  }
}

try {
  await main();
  log.info('Process completed without error.');
} catch (err) {
  if (shutdown.signal.aborted) {
    log.info('Stopped.');
  } else {
    log.error(`Sync failed: ${err instanceof Error ? err.message : String(err)}`, { err });
    process.exitCode = 1;
  }
}
