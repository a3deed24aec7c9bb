import * as cheerio from 'cheerio';
import { Attributes, CandidateDraft } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { HttpClient } from '../http/HttpClient.js';
import { BaseHttpStrategy, StrategyRun, collapseWhitespace } from './BaseHttpStrategy.js';

const NEWS_RSS_URL = 'https://news.google.com/rss/search';

export interface NewsItem {
  title: string;
  link: string;
  publishedAt?: Date;
  source?: string;
}

/**
 * Items of an RSS 2.0 feed, newest first
 */
export function parseNewsFeed(xml: string): NewsItem[] {
  const $ = cheerio.load(xml, { xml: true });
  const items: NewsItem[] = [];

  $('item').each((_, element) => {
    const item = $(element);
    const title = collapseWhitespace(item.find('title').first().text());
    const link = collapseWhitespace(item.find('link').first().text());
    if (!title || !link) return;

    const published = Date.parse(item.find('pubDate').first().text());
    const source = collapseWhitespace(item.find('source').first().text());
    items.push({
      title,
      link,
      ...(Number.isNaN(published) ? {} : { publishedAt: new Date(published) }),
      ...(source ? { source } : {}),
    });
  });

  return items.sort((a, b) => (b.publishedAt?.getTime() ?? 0) - (a.publishedAt?.getTime() ?? 0));
}

/**
 * Only items whose headline names the entity count as coverage
 */
export function mentionsName(item: NewsItem, name: string): boolean {
  const wanted = name.toLowerCase().replace(/[^\w\s]/g, ' ').split(/\s+/).filter((word) => word.length > 2);
  const title = item.title.toLowerCase();
  return wanted.length > 0 && wanted.every((word) => title.includes(word));
}

/**
 * Press coverage signal from a public news feed
 */
export class NewsSearchStrategy extends BaseHttpStrategy {
  readonly id = 'news_search';
  readonly displayName = 'News search';
  readonly sourceType = 'press-news';
  readonly targetKey = 'news';

  constructor(http: HttpClient) {
    super(http, 'News');
  }

  protected async collect(profile: EntityProfile, run: StrategyRun): Promise<CandidateDraft[]> {
    const params = new URLSearchParams({ q: `"${profile.targetIdentity}"`, hl: 'en-US', gl: 'US', ceid: 'US:en' });
    const feedUrl = `${NEWS_RSS_URL}?${params.toString()}`;
    const xml = await run.fetchText(feedUrl, { headers: { Accept: 'application/rss+xml' } });

    const relevant = parseNewsFeed(xml).filter((item) => mentionsName(item, profile.targetIdentity));
    if (relevant.length === 0) return [];

    const latest = relevant[0];
    const attributes: Attributes = {
      newsMentions: relevant.length,
      latestHeadline: latest.title,
      latestNewsUrl: latest.link,
    };
    if (latest.publishedAt) attributes.latestNewsDate = latest.publishedAt.toISOString().slice(0, 10);

    return [
      {
        name: profile.targetIdentity,
        attributes,
        sourceType: 'press-news',
        sourceUrl: feedUrl,
        confidence: 'low',
      },
    ];
  }
}
