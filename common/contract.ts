import type { DomainFilter } from "./domain-filter.ts";
import type { SoftError } from "./errors.ts";

export interface DnsProvider {
	/** Scope of names this provider may touch */
	readonly domainFilter: DomainFilter;
	/** Current observed state, already filtered by the domainFilter */
	Records(signal?: AbortSignal): Promise<Array<Endpoint>>;
	ApplyChanges(changes: ChangeSet, signal?: AbortSignal): Promise<ApplyReport>;
}

// Source defines the interface Endpoint sources should implement.
export interface DnsSource {
	config: {type: string};
	Endpoints(): Promise<Array<Endpoint>>;
}

/** Zone is a basic structure indicating what DNS names are available */
export interface Zone {
	/** The hostname of the DNS zone */
	DNSName: string;
	/** The provider's opaque ID for this zone. */
	ZoneID: string;
}

/** Endpoint is a high-level way of a connection between a service and an IP */
export interface Endpoint {
	/** The hostname of the DNS record */
	DNSName: string;
	/** The targets the DNS record points to */
	Targets: Array<string>;
	/** RecordType type of record, e.g. CNAME, A, TXT etc */
	RecordType: string;
	/** TTL for the record, unset means the backend default */
	RecordTTL?: number;
	/** Labels stores labels defined for the Endpoint */
	Labels?: Record<string,string>;
}

/** ChangeSet holds lists of actions to be executed by dns providers */
export class ChangeSet {
	/** Records that need to be created */
	Create = new Array<Endpoint>();
	/** Records that need to be deleted */
	Delete = new Array<Endpoint>();
	/** Current data of records being replaced, paired with UpdateNew by name and type */
	UpdateOld = new Array<Endpoint>();
	/** Desired data of records being replaced */
	UpdateNew = new Array<Endpoint>();

	length() {
		return this.Create.length + this.UpdateNew.length + this.Delete.length;
	}

	summary() {
		return [
			this.Create.length, 'creates,',
			this.UpdateNew.length, 'updates,',
			this.Delete.length, 'deletes'].join(' ');
	}
}

/** Outcome of one ApplyChanges call that did not hit a hard error */
export interface ApplyReport {
	/** Backend calls issued (or logged, in dry-run mode) */
	calls: number;
	/** Records skipped as out of scope, unsupported or empty */
	skipped: number;
	/** Records refused because the backend cannot represent them */
	softErrors: Array<SoftError>;
}
