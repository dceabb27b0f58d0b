import { domainToUnicode } from "node:url";
import { z } from "zod";

import { ConfigurationError } from "./errors.ts";
import { log } from "./logging.ts";

/** The external representation of a DomainFilter */
export const DomainFilterPayload = z.object({
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  regexInclude: z.string().optional(),
  regexExclude: z.string().optional(),
});
export type DomainFilterPayload = z.infer<typeof DomainFilterPayload>;

type FilterRules =
  | { mode: 'suffix'; include: Array<string>; exclude: Array<string> }
  | { mode: 'regex'; include: RegExp | null; exclude: RegExp | null };

/**
 * Decides whether a DNS name is inside the set of names we may manage.
 *
 * A filter holds either domain suffix rules or regex rules, never both.
 * A rule like `example.org` matches the apex and every subdomain;
 * a rule like `.example.org` only matches subdomains.
 * A filter without any rules matches every name.
 */
export class DomainFilter {
  private constructor(
    private readonly rules: FilterRules,
  ) {}

  static fromDomains(include: Array<string>, exclude: Array<string> = []) {
    return new DomainFilter({
      mode: 'suffix',
      include: prepareFilters(include),
      exclude: prepareFilters(exclude),
    });
  }

  /** Patterns are taken as strings so that the serialized form carries all of them */
  static fromRegex(include?: string | null, exclude?: string | null) {
    return new DomainFilter({
      mode: 'regex',
      include: compileRegex('regexInclude', include),
      exclude: compileRegex('regexExclude', exclude),
    });
  }

  /** Matches everything */
  static unconfigured() {
    return DomainFilter.fromDomains([]);
  }

  /** Reads the serialized form, refusing payloads which mix domain lists and regexes */
  static fromJSON(raw: unknown) {
    const parsed = DomainFilterPayload.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(x => `${x.path.join('.') || 'payload'}: ${x.message}`)
        .join('; ');
      throw new ConfigurationError(`invalid domain filter: ${issues}`);
    }
    const { include, exclude, regexInclude, regexExclude } = parsed.data;

    if (!include?.length && !exclude?.length) {
      return DomainFilter.fromRegex(regexInclude, regexExclude);
    }
    if (regexInclude || regexExclude) {
      throw new ConfigurationError(`cannot have both domain list and regex`);
    }
    return DomainFilter.fromDomains(include ?? [], exclude ?? []);
  }

  toJSON(): DomainFilterPayload {
    const payload: DomainFilterPayload = {};
    if (this.rules.mode == 'regex') {
      if (this.rules.include) payload.regexInclude = this.rules.include.source;
      if (this.rules.exclude) payload.regexExclude = this.rules.exclude.source;
      return payload;
    }
    if (this.rules.include.length) payload.include = [...this.rules.include].sort();
    if (this.rules.exclude.length) payload.exclude = [...this.rules.exclude].sort();
    return payload;
  }

  get mode() {
    return this.rules.mode;
  }

  IsConfigured() {
    if (this.rules.mode == 'regex') {
      return this.rules.include != null || this.rules.exclude != null;
    }
    return this.rules.include.length > 0 || this.rules.exclude.length > 0;
  }

  Match(domain: string) {
    if (this.rules.mode == 'regex') {
      const name = normalizeDomain(domain);
      if (this.rules.exclude?.test(name)) return false;
      return this.rules.include?.test(name) ?? true;
    }
    return matchFilter(this.rules.include, domain, true)
      && !matchFilter(this.rules.exclude, domain, false);
  }

  /**
   * Whether the name is one of our inclusion rules or an ancestor of one,
   * i.e. whether a zone of this name could hold names we manage.
   * Regex rules have no enumerable ancestors, so only their exclusion applies.
   */
  MatchParent(domain: string) {
    if (this.rules.mode == 'regex') {
      return !this.rules.exclude?.test(normalizeDomain(domain));
    }
    if (matchFilter(this.rules.exclude, domain, false)) return false;
    if (this.rules.include.length === 0) return true;

    const name = normalizeDomain(domain);
    for (const filter of this.rules.include) {
      // "only subdomains" rules say nothing about their parents
      if (filter.startsWith('.')) continue;
      if (filter === name || filter.endsWith(`.${name}`)) return true;
    }
    return false;
  }
}

/**
 * Lower-cases, trims a trailing dot, folds compatibility forms (NFKC),
 * and decodes IDNA labels so that `xn--c1yn36f.org.` and `點看.org` compare equal.
 */
export function normalizeDomain(domain: string) {
  let name = domain.trim().normalize('NFKC').toLowerCase();
  if (name.endsWith('.')) name = name.slice(0, -1);
  return name.split('.').map(label => {
    if (!label.startsWith('xn--')) return label;
    const decoded = domainToUnicode(label);
    if (!decoded) {
      log.debug(`Keeping undecodable IDNA label as-is`, { label, domain });
      return label;
    }
    return decoded.toLowerCase();
  }).join('.');
}

/** Normalizes rules and drops the empty ones */
export function prepareFilters(filters: Array<string>) {
  return filters
    .map(normalizeDomain)
    .filter(x => x !== '');
}

export function matchFilter(filters: Array<string>, domain: string, emptyval: boolean) {
  if (filters.length === 0) return emptyval;

  const name = normalizeDomain(domain);
  for (const filter of filters) {
    if (filter.startsWith('.')) {
      if (name.endsWith(filter)) return true;
    } else if (name === filter || name.endsWith(`.${filter}`)) {
      return true;
    }
  }
  return false;
}

function compileRegex(key: 'regexInclude' | 'regexExclude', pattern?: string | null) {
  if (!pattern) return null;
  try {
    return new RegExp(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`invalid ${key}: ${reason}`);
  }
}
