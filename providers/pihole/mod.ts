import type { Endpoint } from "../../common/contract.ts";
import type { PiholeProviderConfig } from "../../common/config.ts";
import { domainFilterFromConfig } from "../../common/config.ts";
import { AdapterProvider, type ProviderOptions } from "../adapter-provider.ts";
import type { RecordAdapter } from "../reconciler.ts";
import { ConfigResponse, listingPath, parseRecordLines, PiholeRecordTypes, recordElement, recordPath } from "./api.ts";
import { PiholeClient } from "./client.ts";

export class PiholeProvider extends AdapterProvider {
  constructor(
    public readonly config: PiholeProviderConfig,
    client: PiholeClient,
    opts?: ProviderOptions,
  ) {
    super(new PiholeAdapter(client), domainFilterFromConfig(config), opts);
  }

  static async connect(config: PiholeProviderConfig, opts?: ProviderOptions, signal?: AbortSignal) {
    const client = await PiholeClient.connect({
      server: config.server,
      password: config.password ?? process.env['PIHOLE_PASSWORD'],
    }, signal);
    return new PiholeProvider(config, client, opts);
  }
}

/**
 * Local DNS records of a Pi-hole v6 instance.
 * Every target is its own config entry, but one name and type reads back as one group.
 */
export class PiholeAdapter implements RecordAdapter {
  readonly name = 'pihole';
  readonly groupsTargets = true;
  readonly supportsWildcards = false;
  readonly recordTypes = PiholeRecordTypes;

  constructor(
    private readonly client: PiholeClient,
  ) {}

  async listRecords(recordType: string, signal?: AbortSignal): Promise<Array<Endpoint>> {
    const data = await this.client.request({ path: listingPath(recordType), signal });
    const parsed = ConfigResponse.safeParse(data);
    if (!parsed.success) throw new Error(
      `Pi-hole returned an unreadable ${recordType} listing: ${parsed.error.message}`);
    const lines = parsed.data.config.dns[recordElement(recordType)] ?? [];
    return parseRecordLines(recordType, lines);
  }

  async createTarget(endpoint: Endpoint, target: string, signal?: AbortSignal) {
    await this.client.request({ method: 'PUT', path: recordPath(endpoint, target), signal });
  }

  async deleteTarget(endpoint: Endpoint, target: string, signal?: AbortSignal) {
    await this.client.request({ method: 'DELETE', path: recordPath(endpoint, target), signal });
  }
}
