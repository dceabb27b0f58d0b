import { BackendError, ConfigurationError } from "../../common/errors.ts";
import { JsonClient } from "../json-client.ts";

/** The parts of the Vultr API which the provider uses, so tests can stand in for it */
export interface VultrApiSurface {
  listAllZones(signal?: AbortSignal): AsyncGenerator<DomainRecord>;
  listAllRecords(zone: string, signal?: AbortSignal): AsyncGenerator<DnsRecord>;
  createRecord(zone: string, record: DnsRecordData, signal?: AbortSignal): Promise<DnsRecord>;
  deleteRecord(zone: string, recordId: string, signal?: AbortSignal): Promise<void>;
}

export class VultrApi extends JsonClient implements VultrApiSurface {
  #apiKey: string;
  constructor(apiKey = process.env['VULTR_API_KEY']) {
    super('vultr', `https://api.vultr.com`);
    if (!apiKey) throw new ConfigurationError(`VULTR_API_KEY is required to use Vultr`);
    this.#apiKey = apiKey;
  }

  protected addAuthHeaders(headers: Headers) {
    headers.set('authorization', `Bearer ${this.#apiKey}`);
  }

  async listZones(pageToken?: string, signal?: AbortSignal): Promise<DomainList> {
    const query = new URLSearchParams;
    if (pageToken) query.set('cursor', pageToken);
    const data = await this.doHttp({ path: `/v2/domains`, query, signal });
    if (!isDomainList(data)) throw unexpectedBody('domain listing');
    return data;
  }
  async *listAllZones(signal?: AbortSignal) {
    let page: DomainList | undefined;
    do {
      page = await this.listZones(page?.meta.links.next, signal);
      yield* page.domains;
    } while (page.meta.links.next);
  }

  async listRecords(zone: string, pageToken?: string, signal?: AbortSignal): Promise<RecordList> {
    if (!zone) throw new Error(`Zone is required`);
    const query = new URLSearchParams;
    if (pageToken) query.set('cursor', pageToken);
    const data = await this.doHttp({ path: `/v2/domains/${zone}/records`, query, signal });
    if (!isRecordList(data)) throw unexpectedBody(`record listing of ${zone}`);
    return data;
  }
  async *listAllRecords(zone: string, signal?: AbortSignal) {
    let page: RecordList | undefined;
    do {
      page = await this.listRecords(zone, page?.meta.links.next, signal);
      yield* page.records;
    } while (page.meta.links.next);
  }

  async createRecord(zone: string, record: DnsRecordData, signal?: AbortSignal): Promise<DnsRecord> {
    if (!zone) throw new Error(`Zone is required`);
    const data = await this.doHttp({
      method: 'POST',
      path: `/v2/domains/${zone}/records`,
      jsonBody: record,
      signal,
    });
    if (!isCreatedRecord(data)) throw unexpectedBody(`record creation in ${zone}`);
    return data.record;
  }

  /** Deleting a record which is already gone counts as success */
  async deleteRecord(zone: string, recordId: string, signal?: AbortSignal): Promise<void> {
    if (!zone) throw new Error(`Zone is required`);
    if (!recordId) throw new Error(`Record ID is required`);
    const resp = await this.sendHttp({
      method: 'DELETE',
      path: `/v2/domains/${zone}/records/${recordId}`,
      signal,
    });
    if (resp.status == 404 || resp.status < 400) return;
    throw new BackendError(this.name, resp.status, resp.statusText, resp.text, null, null);
  }
}

// Vultr's documented shapes are trusted past these checks.
function isDomainList(data: unknown): data is DomainList {
  return typeof data === 'object' && data != null && 'meta' in data
    && 'domains' in data && Array.isArray(data.domains);
}
function isRecordList(data: unknown): data is RecordList {
  return typeof data === 'object' && data != null && 'meta' in data
    && 'records' in data && Array.isArray(data.records);
}
function isCreatedRecord(data: unknown): data is { record: DnsRecord } {
  return typeof data === 'object' && data != null && 'record' in data
    && typeof data.record === 'object' && data.record != null;
}
function unexpectedBody(what: string) {
  return new BackendError('vultr', 200, 'invalid_response', `unexpected body for ${what}`, null, null);
}

export interface DomainRecord {
  domain: string;
  date_created: string;
}

interface DomainList {
  domains: Array<DomainRecord>;
  meta: ListMeta;
}

export interface DnsRecordData {
  type: string;
  name: string;
  data: string;
  priority?: number;
  ttl?: number;
}

export interface DnsRecord extends DnsRecordData {
  id: string;
  priority: number;
  ttl: number;
}

interface RecordList {
  records: Array<DnsRecord>;
  meta: ListMeta;
}

interface ListMeta {
  total: number;
  links: {
    next: string, prev: string;
  };
}
