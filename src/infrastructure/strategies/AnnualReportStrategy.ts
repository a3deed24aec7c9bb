import * as cheerio from 'cheerio';
import { Attributes, CandidateDraft } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { HttpClient } from '../http/HttpClient.js';
import { BaseHttpStrategy, StrategyRun, collapseWhitespace, toUrl } from './BaseHttpStrategy.js';

const REPORT_KEYWORDS = /annual[\s_-]*report|acfr|cafr|comprehensive annual financial|financial report/i;
const INVESTOR_PAGE_KEYWORDS = /investor[\s_-]*relations|publications|reports/i;

const SCALE: Record<string, number> = {
  thousand: 1e3,
  million: 1e6,
  billion: 1e9,
  trillion: 1e12,
};

/**
 * Report links on a page, resolved against the page URL, most recent year first
 */
export function findReportLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const found = new Map<string, number>();

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    const text = collapseWhitespace($(element).text());
    if (!REPORT_KEYWORDS.test(href) && !REPORT_KEYWORDS.test(text)) return;

    let resolved: string;
    try {
      resolved = new URL(href, pageUrl).href;
    } catch {
      return;
    }
    const year = /(?:19|20)\d{2}/.exec(`${text} ${href}`);
    found.set(resolved, Math.max(found.get(resolved) ?? 0, year ? Number(year[0]) : 0));
  });

  return Array.from(found.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([url]) => url);
}

export function findInvestorPage(html: string, pageUrl: string): string | null {
  const $ = cheerio.load(html);
  for (const element of $('a[href]').toArray()) {
    const href = $(element).attr('href') ?? '';
    if (INVESTOR_PAGE_KEYWORDS.test(href) || INVESTOR_PAGE_KEYWORDS.test($(element).text())) {
      try {
        return new URL(href, pageUrl).href;
      } catch {
        return null;
      }
    }
  }
  return null;
}

/**
 * Dollar figure stated next to "assets", e.g. "$12.5 billion in assets under management"
 */
export function extractAssetFigure(text: string): number | null {
  const pattern =
    /\$\s?([\d,]+(?:\.\d+)?)\s*(thousand|million|billion|trillion)\b[^.$]{0,40}?\b(?:assets|aum|net position)/i;
  const match = pattern.exec(collapseWhitespace(text));
  if (!match) return null;
  const amount = Number(match[1].replace(/,/g, ''));
  const scale = SCALE[match[2].toLowerCase()];
  if (!Number.isFinite(amount) || scale === undefined) return null;
  return Math.round(amount * scale);
}

function pageText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  return $('body').text();
}

/**
 * Annual and financial reports published on the entity's own site
 */
export class AnnualReportStrategy extends BaseHttpStrategy {
  readonly id = 'annual_report';
  readonly displayName = 'Published annual reports';
  readonly sourceType = 'official-primary';
  readonly targetKey = 'web';

  constructor(http: HttpClient) {
    super(http, 'AnnualReport');
  }

  protected async collect(profile: EntityProfile, run: StrategyRun): Promise<CandidateDraft[]> {
    const website = profile.attributes.website;
    const home = typeof website === 'string' ? toUrl(website) : null;
    if (!home) {
      throw new Error('No website URL available to search for reports');
    }
    const targetKey = `web:${home.hostname}`;

    const homepage = await run.fetchText(home.href, { targetKey, headers: { Accept: 'text/html' } });
    let links = findReportLinks(homepage, home.href);
    let assets = extractAssetFigure(pageText(homepage));

    if (links.length === 0) {
      const investorPage = findInvestorPage(homepage, home.href);
      if (investorPage) {
        const html = await run.fetchText(investorPage, { targetKey, headers: { Accept: 'text/html' } });
        links = findReportLinks(html, investorPage);
        assets = assets ?? extractAssetFigure(pageText(html));
      }
    }

    if (links.length === 0 && assets === null) {
      throw new Error('No annual report links found');
    }

    const latest = links[0];
    if (latest && assets === null && !/\.pdf($|\?)/i.test(latest)) {
      try {
        const report = await run.fetchText(latest, { targetKey, headers: { Accept: 'text/html' } });
        assets = extractAssetFigure(pageText(report));
      } catch (error) {
        run.warn(`Could not read report page ${latest}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const attributes: Attributes = {};
    if (latest) attributes.annualReportUrl = latest;
    if (assets !== null) attributes.aum = assets;
    const year = latest ? /(?:19|20)\d{2}/.exec(latest) : null;
    if (year) attributes.reportYear = Number(year[0]);

    return [
      {
        name: profile.targetIdentity,
        attributes,
        sourceType: 'official-primary',
        sourceUrl: latest ?? home.href,
        confidence: assets !== null ? 'high' : 'medium',
      },
    ];
  }
}
