import * as cheerio from 'cheerio';
import { z } from 'zod';
import { Attributes, CandidateDraft } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { HttpClient } from '../http/HttpClient.js';
import { BaseHttpStrategy, StrategyRun, collapseWhitespace, toUrl } from './BaseHttpStrategy.js';

const MAX_DESCRIPTION_LENGTH = 500;

const addressSchema = z
  .object({
    addressLocality: z.string().optional(),
    addressRegion: z.string().optional(),
    addressCountry: z.union([z.string(), z.object({ name: z.string() })]).optional(),
  })
  .passthrough();

const organizationSchema = z
  .object({
    '@type': z.union([z.string(), z.array(z.string())]),
    name: z.string().optional(),
    description: z.string().optional(),
    foundingDate: z.string().optional(),
    address: z.union([addressSchema, z.array(addressSchema)]).optional(),
    sameAs: z.union([z.string(), z.array(z.string())]).optional(),
  })
  .passthrough();

type Organization = z.infer<typeof organizationSchema>;

const ORGANIZATION_TYPES = ['Organization', 'Corporation', 'FinancialService', 'InvestmentFund', 'LocalBusiness'];

function isOrganization(org: Organization): boolean {
  const types = Array.isArray(org['@type']) ? org['@type'] : [org['@type']];
  return types.some((type) => ORGANIZATION_TYPES.includes(type));
}

function findOrganization(node: unknown): Organization | null {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findOrganization(item);
      if (found) return found;
    }
    return null;
  }
  const graph = z.object({ '@graph': z.array(z.unknown()) }).safeParse(node);
  if (graph.success) return findOrganization(graph.data['@graph']);

  const org = organizationSchema.safeParse(node);
  return org.success && isOrganization(org.data) ? org.data : null;
}

function formatAddress(address: Organization['address']): string | undefined {
  const first = Array.isArray(address) ? address[0] : address;
  if (!first) return undefined;
  const country = typeof first.addressCountry === 'string' ? first.addressCountry : first.addressCountry?.name;
  const parts = [first.addressLocality, first.addressRegion, country].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function parseLdJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Strip the trailing " | Home" style decoration from a page title
 */
export function siteNameFromTitle(title: string): string {
  return collapseWhitespace(title.split(/\s+[|\-–—:]\s+/)[0] ?? title);
}

/**
 * Extract what a homepage says about its owner
 */
export function parseHomepage(html: string, pageUrl: string): CandidateDraft | null {
  const $ = cheerio.load(html);

  let org: Organization | null = null;
  for (const element of $('script[type="application/ld+json"]').toArray()) {
    org = findOrganization(parseLdJson($(element).text()));
    if (org) break;
  }

  const metaName = $('meta[property="og:site_name"]').attr('content');
  const title = $('title').first().text();
  const name = collapseWhitespace(org?.name ?? metaName ?? (title ? siteNameFromTitle(title) : ''));
  if (!name) return null;

  const attributes: Attributes = {};
  const url = toUrl(pageUrl);
  if (url) attributes.website = url.origin;

  const description =
    org?.description ??
    $('meta[name="description"]').attr('content') ??
    $('meta[property="og:description"]').attr('content');
  if (description && collapseWhitespace(description)) {
    attributes.description = collapseWhitespace(description).slice(0, MAX_DESCRIPTION_LENGTH);
  }

  const location = formatAddress(org?.address) ?? collapseWhitespace($('address').first().text());
  if (location) attributes.location = location;

  if (org?.foundingDate) {
    const year = /^(\d{4})/.exec(org.foundingDate);
    if (year) attributes.foundedYear = Number(year[1]);
  }

  const linkedin = $('a[href*="linkedin.com/company"]').first().attr('href');
  if (linkedin) attributes.linkedinUrl = linkedin;

  return {
    name,
    attributes,
    sourceType: 'first-party-content',
    sourceUrl: url ? url.href : pageUrl,
    confidence: org ? 'high' : 'medium',
  };
}

/**
 * Reads the entity's own homepage
 */
export class OfficialWebsiteStrategy extends BaseHttpStrategy {
  readonly id = 'official_website';
  readonly displayName = 'Official website';
  readonly sourceType = 'first-party-content';
  readonly targetKey = 'web';

  constructor(http: HttpClient) {
    super(http, 'Website');
  }

  protected async collect(profile: EntityProfile, run: StrategyRun): Promise<CandidateDraft[]> {
    const website = profile.attributes.website;
    const url = typeof website === 'string' ? toUrl(website) : null;
    if (!url) {
      throw new Error('No valid website URL for this entity');
    }

    const html = await run.fetchText(url.href, { targetKey: `web:${url.hostname}`, headers: { Accept: 'text/html' } });
    const draft = parseHomepage(html, url.href);
    if (!draft) {
      run.warn(`No site name found on ${url.href}`);
      return [];
    }
    return [draft];
  }
}
