// packages/engines/src/advisories.ts
import { z } from 'zod';
import { createDebugLogger } from '@mltriage/core';

const dbg = createDebugLogger('advisories');

export interface AdvisoryQuery {
  /** Normalized PyPI project name. */
  name: string;
  version: string;
}

export interface Advisory {
  id: string;
  summary: string;
  /** CRITICAL/HIGH advisories are `critical`, the rest `warn`. */
  severity: 'critical' | 'warn';
  aliases: string[];
  fixedIn: string[];
}

/**
 * Vulnerability lookup for pinned requirements, keyed by `name@version`.
 */
export interface AdvisorySource {
  lookup(queries: readonly AdvisoryQuery[]): Promise<Map<string, Advisory[]>>;
}

export function queryKey(q: AdvisoryQuery): string {
  return `${q.name}@${q.version}`;
}

const BatchResponse = z.object({
  results: z.array(
    z
      .object({
        vulns: z.array(z.object({ id: z.string() }).passthrough()).optional(),
      })
      .passthrough()
  ),
});

const Vulnerability = z
  .object({
    id: z.string(),
    summary: z.string().optional(),
    details: z.string().optional(),
    aliases: z.array(z.string()).optional(),
    database_specific: z.object({ severity: z.string().optional() }).passthrough().optional(),
    affected: z
      .array(
        z
          .object({
            ranges: z
              .array(z.object({ events: z.array(z.object({ fixed: z.string().optional() }).passthrough()) }).passthrough())
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

type VulnerabilityRecord = z.infer<typeof Vulnerability>;

export function toAdvisory(v: VulnerabilityRecord): Advisory {
  const level = String(v.database_specific?.severity ?? '').toUpperCase();
  const fixed = new Set<string>();
  for (const a of v.affected ?? []) {
    for (const r of a.ranges ?? []) for (const e of r.events) if (e.fixed) fixed.add(e.fixed);
  }
  const summary = v.summary ?? v.details?.split('\n')[0] ?? v.id;
  return {
    id: v.id,
    summary,
    severity: level === 'CRITICAL' || level === 'HIGH' ? 'critical' : 'warn',
    aliases: v.aliases ?? [],
    fixedIn: [...fixed],
  };
}

type FetchInit = NonNullable<Parameters<typeof fetch>[1]>;

export interface OsvAdvisorySourceOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  /** Per-request timeout. */
  timeoutMs?: number;
}

/**
 * Queries the OSV API: one `querybatch` call for all pins, then one record
 * fetch per distinct vulnerability id.
 */
export class OsvAdvisorySource implements AdvisorySource {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: OsvAdvisorySourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://api.osv.dev').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  private async getJson(url: string, init: FetchInit = {}): Promise<unknown> {
    const doFetch = this.fetchImpl;
    const res = await doFetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) throw new Error(`OSV request failed: HTTP ${res.status} for ${url}`);
    return res.json();
  }

  async lookup(queries: readonly AdvisoryQuery[]): Promise<Map<string, Advisory[]>> {
    const out = new Map<string, Advisory[]>();
    if (!queries.length) return out;

    const body = {
      queries: queries.map((q) => ({ package: { name: q.name, ecosystem: 'PyPI' }, version: q.version })),
    };
    const batch = BatchResponse.safeParse(
      await this.getJson(`${this.baseUrl}/v1/querybatch`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(body),
      })
    );
    if (!batch.success) throw new Error(`OSV querybatch returned an unexpected shape: ${batch.error.issues[0]?.message ?? ''}`);
    if (batch.data.results.length !== queries.length) {
      throw new Error(`OSV querybatch returned ${batch.data.results.length} results for ${queries.length} queries`);
    }

    const records = new Map<string, Advisory>();
    for (const result of batch.data.results) {
      for (const { id } of result.vulns ?? []) {
        if (records.has(id)) continue;
        const parsed = Vulnerability.safeParse(await this.getJson(`${this.baseUrl}/v1/vulns/${encodeURIComponent(id)}`));
        if (!parsed.success) throw new Error(`OSV record ${id} has an unexpected shape`);
        records.set(id, toAdvisory(parsed.data));
      }
    }

    queries.forEach((q, i) => {
      const ids = batch.data.results[i]?.vulns?.map((v) => v.id) ?? [];
      out.set(
        queryKey(q),
        ids.flatMap((id) => {
          const a = records.get(id);
          return a ? [a] : [];
        })
      );
    });
    dbg('lookup', { queries: queries.length, advisories: records.size });
    return out;
  }
}

/**
 * Remembers answers per `name@version`, so repeated pins across requirement
 * files cost one query.
 */
export class CachedAdvisorySource implements AdvisorySource {
  private readonly cache = new Map<string, Advisory[]>();

  constructor(private readonly inner: AdvisorySource) {}

  async lookup(queries: readonly AdvisoryQuery[]): Promise<Map<string, Advisory[]>> {
    const missing = new Map<string, AdvisoryQuery>();
    for (const q of queries) if (!this.cache.has(queryKey(q))) missing.set(queryKey(q), q);

    if (missing.size) {
      const fresh = await this.inner.lookup([...missing.values()]);
      for (const key of missing.keys()) this.cache.set(key, fresh.get(key) ?? []);
    }

    const out = new Map<string, Advisory[]>();
    for (const q of queries) out.set(queryKey(q), this.cache.get(queryKey(q)) ?? []);
    return out;
  }
}
