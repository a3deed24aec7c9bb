import { z } from 'zod';
import { Attributes, CandidateDraft } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { normalizeName } from '../../application/services/EntityMatcher.js';
import { HttpClient } from '../http/HttpClient.js';
import { BaseHttpStrategy, StrategyRun, parseJsonBody } from './BaseHttpStrategy.js';

const SUBMISSIONS_URL = 'https://data.sec.gov/submissions';
const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';
const BROWSE_URL = 'https://www.sec.gov/cgi-bin/browse-edgar';

const TICKER_TABLE_TTL_MS = 24 * 60 * 60 * 1000;

const nullableString = z.string().nullish();

const submissionsSchema = z.object({
  cik: z.union([z.string(), z.number()]),
  name: z.string(),
  sicDescription: nullableString,
  tickers: z.array(z.string()).optional(),
  exchanges: z.array(z.string().nullable()).optional(),
  website: nullableString,
  stateOfIncorporation: nullableString,
  ein: nullableString,
  addresses: z
    .object({
      business: z.object({ city: nullableString, stateOrCountry: nullableString }).partial().nullish(),
    })
    .partial()
    .optional(),
  filings: z
    .object({
      recent: z.object({ form: z.array(z.string()), filingDate: z.array(z.string()) }).partial().optional(),
    })
    .optional(),
});

export type EdgarSubmissions = z.infer<typeof submissionsSchema>;

const tickerTableSchema = z.record(z.object({ cik_str: z.number(), ticker: z.string(), title: z.string() }));

export function stripCik(cik: string | number): string {
  return String(cik).replace(/^0+(?=\d)/, '');
}

export function padCik(cik: string | number): string {
  return stripCik(cik).padStart(10, '0');
}

/**
 * First CIK mentioned in an EDGAR company-search page or Atom feed
 */
export function extractCikFromSearch(body: string): string | null {
  const match = /CIK=(\d{10})/.exec(body) ?? /<cik>(\d+)<\/cik>/i.exec(body);
  return match ? stripCik(match[1]) : null;
}

/**
 * Find a CIK in the public ticker table by ticker, else by normalized name
 */
export function findCikInTickerTable(body: string, ticker?: string, name?: string): string | null {
  const table = Object.values(parseJsonBody(tickerTableSchema, body, 'SEC ticker table'));
  if (ticker) {
    const wanted = ticker.trim().toUpperCase();
    const hit = table.find((row) => row.ticker.toUpperCase() === wanted);
    if (hit) return String(hit.cik_str);
  }
  if (name) {
    const wanted = normalizeName(name);
    const hit = table.find((row) => normalizeName(row.title) === wanted);
    if (hit) return String(hit.cik_str);
  }
  return null;
}

/**
 * Reduce a submissions document to one candidate draft
 */
export function parseSubmissions(body: string): CandidateDraft {
  const data = parseJsonBody(submissionsSchema, body, 'SEC submissions');
  const cik = stripCik(data.cik);
  const attributes: Attributes = { cik };

  const ticker = data.tickers?.[0];
  if (ticker) attributes.ticker = ticker;
  const exchange = data.exchanges?.find((value): value is string => Boolean(value));
  if (exchange) attributes.exchange = exchange;
  if (data.sicDescription) attributes.industry = data.sicDescription;
  if (data.website) attributes.website = data.website;
  if (data.stateOfIncorporation) attributes.stateOfIncorporation = data.stateOfIncorporation;
  if (data.ein) attributes.ein = data.ein;

  const business = data.addresses?.business;
  const location = [business?.city, business?.stateOrCountry].filter((part): part is string => Boolean(part)).join(', ');
  if (location) attributes.location = location;

  const forms = data.filings?.recent?.form ?? [];
  const dates = data.filings?.recent?.filingDate ?? [];
  const index13f = forms.findIndex((form) => form.toUpperCase().startsWith('13F'));
  if (index13f !== -1 && dates[index13f]) {
    attributes.latest13fFilingDate = dates[index13f];
  }

  return {
    name: data.name,
    attributes,
    sourceType: 'regulatory-filing',
    sourceUrl: `${BROWSE_URL}?action=getcompany&CIK=${padCik(cik)}`,
    confidence: 'high',
  };
}

/**
 * Company facts from SEC EDGAR filer records
 */
export class SecEdgarStrategy extends BaseHttpStrategy {
  readonly id = 'sec_edgar';
  readonly displayName = 'SEC EDGAR filings';
  readonly sourceType = 'regulatory-filing';
  readonly targetKey = 'sec';

  constructor(http: HttpClient) {
    super(http, 'SecEdgar');
  }

  protected async collect(profile: EntityProfile, run: StrategyRun): Promise<CandidateDraft[]> {
    const cik = await this.resolveCik(profile, run);
    if (!cik) {
      this.log.info(`No CIK found for "${profile.targetIdentity}"`);
      return [];
    }

    const body = await run.fetchText(`${SUBMISSIONS_URL}/CIK${padCik(cik)}.json`, {
      headers: { Accept: 'application/json' },
    });
    return [parseSubmissions(body)];
  }

  private async resolveCik(profile: EntityProfile, run: StrategyRun): Promise<string | null> {
    const known = profile.attributes.cik;
    if (typeof known === 'string' || typeof known === 'number') {
      if (/^\d+$/.test(String(known).trim())) return stripCik(String(known).trim());
    }

    const ticker = typeof profile.attributes.ticker === 'string' ? profile.attributes.ticker : undefined;
    const table = await run.fetchText(TICKERS_URL, {
      headers: { Accept: 'application/json' },
      cacheTtlMs: TICKER_TABLE_TTL_MS,
    });
    const fromTable = findCikInTickerTable(table, ticker, profile.targetIdentity);
    if (fromTable) return fromTable;

    const searchName = profile.targetIdentity.replace(/'/g, '').replace(/&/g, 'and');
    const params = new URLSearchParams({ company: searchName, type: '13F-HR', action: 'getcompany', output: 'atom' });
    const feed = await run.fetchText(`${BROWSE_URL}?${params.toString()}`);
    return extractCikFromSearch(feed);
  }
}
