import type { AgentConfig } from '../config/agent.js';
import { SEED_PARTNERS } from '../data/partners.js';
import { PartnerSearchRequest, PartnerSearchResponse, type PartnerRecordT } from '../schemas/partner.js';
import { fetchJSON, registerAllowedHost } from '../util/fetch.js';
import type { ToolLogger } from '../util/logging.js';
import { errorMessage } from './errors.js';

export type PartnerMatch =
  | { found: true; partner: PartnerRecordT }
  | { found: false; suggestions: string[] };

export interface PartnerDirectory {
  readonly kind: 'static' | 'remote';
  search(query: string): Promise<PartnerMatch>;
}

const MAX_SUGGESTIONS = 3;

/**
 * Exact case-insensitive name match first, then substring match.
 * First record in list order wins in both passes.
 */
export function searchPartner(records: readonly PartnerRecordT[], query: string): PartnerRecordT | null {
  const q = query.trim().toLowerCase();
  if (!q) return null;
  const exact = records.find((r) => r.name.toLowerCase() === q);
  if (exact) return exact;
  return records.find((r) => r.name.toLowerCase().includes(q)) ?? null;
}

/** Names containing any word of the query. */
export function suggestPartners(records: readonly PartnerRecordT[], query: string, max = MAX_SUGGESTIONS): string[] {
  const words = query.trim().toLowerCase().split(/\s+/).filter(Boolean);
  if (words.length === 0) return [];
  return records
    .filter((r) => {
      const name = r.name.toLowerCase();
      return words.some((w) => name.includes(w));
    })
    .slice(0, max)
    .map((r) => r.name);
}

export function matchPartner(records: readonly PartnerRecordT[], query: string): PartnerMatch {
  const partner = searchPartner(records, query);
  if (partner) return { found: true, partner };
  return { found: false, suggestions: suggestPartners(records, query) };
}

export class StaticPartnerDirectory implements PartnerDirectory {
  readonly kind = 'static';

  constructor(private readonly records: readonly PartnerRecordT[] = SEED_PARTNERS) {}

  async search(query: string): Promise<PartnerMatch> {
    return matchPartner(this.records, query);
  }
}

export type RemotePartnerDirectoryOptions = {
  baseUrl: string;
  timeoutMs?: number;
  limit?: number;
  log?: ToolLogger;
};

/**
 * Catalog-backed directory. Network and payload failures read as "not found";
 * callers never see them.
 */
export class RemotePartnerDirectory implements PartnerDirectory {
  readonly kind = 'remote';
  private readonly searchUrl: string;

  constructor(private readonly opts: RemotePartnerDirectoryOptions) {
    this.searchUrl = `${opts.baseUrl.replace(/\/$/, '')}/search`;
    registerAllowedHost(this.searchUrl);
  }

  async search(query: string): Promise<PartnerMatch> {
    const q = query.trim();
    if (!q) return { found: false, suggestions: [] };

    let candidates: PartnerRecordT[];
    try {
      const body = PartnerSearchRequest.parse({ query: q, limit: this.opts.limit ?? 10 });
      const json = await fetchJSON(this.searchUrl, {
        method: 'POST',
        body,
        timeoutMs: this.opts.timeoutMs ?? 5000,
        target: 'partner_directory',
      });
      const parsed = PartnerSearchResponse.safeParse(json);
      if (!parsed.success) {
        this.opts.log?.warn({ issues: parsed.error.issues.length }, 'partners.remote.invalid_response');
        return { found: false, suggestions: [] };
      }
      candidates = parsed.data;
    } catch (err: unknown) {
      this.opts.log?.warn({ reason: errorMessage(err) }, 'partners.remote.unavailable');
      return { found: false, suggestions: [] };
    }

    return matchPartner(candidates, q);
  }
}

export function createPartnerDirectory(cfg: AgentConfig['partners'], log?: ToolLogger): PartnerDirectory {
  if (cfg.source === 'remote' && cfg.baseUrl) {
    return new RemotePartnerDirectory({ baseUrl: cfg.baseUrl, timeoutMs: cfg.timeoutMs, limit: cfg.limit, log });
  }
  return new StaticPartnerDirectory();
}

/** Tool text handed back to the model. */
export function describePartnerMatch(query: string, match: PartnerMatch): string {
  if (match.found) {
    const p = match.partner;
    return `Found business partner: ${p.name} (ID: ${p.id}). Location: ${p.city}, ${p.country}`;
  }
  if (match.suggestions.length > 0) {
    return `Business partner '${query}' not found. Did you mean one of these? ${match.suggestions.join(', ')}`;
  }
  return `Business partner '${query}' not found. Please check the spelling or try a different name.`;
}
