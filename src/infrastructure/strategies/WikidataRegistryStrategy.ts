import { z } from 'zod';
import { Attributes, CandidateDraft } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { nameSimilarity, normalizeName } from '../../application/services/EntityMatcher.js';
import { HttpClient } from '../http/HttpClient.js';
import { BaseHttpStrategy, StrategyRun, parseJsonBody } from './BaseHttpStrategy.js';

const API_URL = 'https://www.wikidata.org/w/api.php';
const ENTITY_URL = 'https://www.wikidata.org/wiki/Special:EntityData';

// Registry properties read from an entity's claims
const PROPERTY = {
  officialWebsite: 'P856',
  inception: 'P571',
  employees: 'P1128',
  tickerSymbol: 'P249',
  cik: 'P5531',
  lei: 'P1278',
} as const;

const searchSchema = z.object({
  search: z.array(
    z.object({
      id: z.string(),
      label: z.string().optional(),
      description: z.string().optional(),
    })
  ),
});

export type RegistryHit = z.infer<typeof searchSchema>['search'][number];

const snakSchema = z.object({
  mainsnak: z.object({
    datavalue: z.object({ value: z.unknown() }).optional(),
  }),
});

const entitySchema = z.object({
  entities: z.record(
    z.object({
      labels: z.record(z.object({ value: z.string() })).optional(),
      descriptions: z.record(z.object({ value: z.string() })).optional(),
      claims: z.record(z.array(snakSchema)).optional(),
    })
  ),
});

const quantitySchema = z.object({ amount: z.string() });
const timeSchema = z.object({ time: z.string() });

/**
 * Best search hit whose label is close enough to the target name
 */
export function pickRegistryHit(body: string, targetName: string, threshold: number): RegistryHit | null {
  const { search } = parseJsonBody(searchSchema, body, 'Registry search');
  const target = normalizeName(targetName);

  let best: RegistryHit | null = null;
  let bestScore = 0;
  for (const hit of search) {
    if (!hit.label) continue;
    const score = nameSimilarity(target, normalizeName(hit.label));
    if (score >= threshold && score > bestScore) {
      best = hit;
      bestScore = score;
    }
  }
  return best;
}

function claimValues(claims: Record<string, z.infer<typeof snakSchema>[]> | undefined, property: string): unknown[] {
  return (claims?.[property] ?? []).flatMap((claim) =>
    claim.mainsnak.datavalue ? [claim.mainsnak.datavalue.value] : []
  );
}

/**
 * Registry entity document -> one candidate draft (or null when the id is absent)
 */
export function parseRegistryEntity(body: string, entityId: string): CandidateDraft | null {
  const { entities } = parseJsonBody(entitySchema, body, 'Registry entity');
  const entity = entities[entityId];
  if (!entity) return null;

  const name = entity.labels?.en?.value;
  if (!name) return null;

  const attributes: Attributes = { registryId: entityId };
  const description = entity.descriptions?.en?.value;
  if (description) attributes.description = description;

  const website = claimValues(entity.claims, PROPERTY.officialWebsite).find((v): v is string => typeof v === 'string');
  if (website) attributes.website = website;

  const ticker = claimValues(entity.claims, PROPERTY.tickerSymbol).find((v): v is string => typeof v === 'string');
  if (ticker) attributes.ticker = ticker;

  const cik = claimValues(entity.claims, PROPERTY.cik).find((v): v is string => typeof v === 'string');
  if (cik) attributes.cik = cik.replace(/^0+(?=\d)/, '');

  const lei = claimValues(entity.claims, PROPERTY.lei).find((v): v is string => typeof v === 'string');
  if (lei) attributes.lei = lei;

  for (const value of claimValues(entity.claims, PROPERTY.employees)) {
    const quantity = quantitySchema.safeParse(value);
    if (quantity.success) {
      const amount = Number(quantity.data.amount);
      if (Number.isFinite(amount)) {
        attributes.employees = amount;
        break;
      }
    }
  }

  for (const value of claimValues(entity.claims, PROPERTY.inception)) {
    const time = timeSchema.safeParse(value);
    const year = time.success ? /^[+-]?(\d{4})/.exec(time.data.time) : null;
    if (year) {
      attributes.foundedYear = Number(year[1]);
      break;
    }
  }

  return {
    name,
    attributes,
    sourceType: 'structured-registry',
    sourceUrl: `https://www.wikidata.org/wiki/${entityId}`,
    confidence: 'medium',
  };
}

/**
 * Entity lookup in the public structured registry
 */
export class WikidataRegistryStrategy extends BaseHttpStrategy {
  readonly id = 'wikidata_registry';
  readonly displayName = 'Public structured registry';
  readonly sourceType = 'structured-registry';
  readonly targetKey = 'wikidata';

  constructor(http: HttpClient, private readonly matchThreshold: number = 0.85) {
    super(http, 'Registry');
  }

  protected async collect(profile: EntityProfile, run: StrategyRun): Promise<CandidateDraft[]> {
    const params = new URLSearchParams({
      action: 'wbsearchentities',
      search: profile.targetIdentity,
      language: 'en',
      type: 'item',
      limit: '5',
      format: 'json',
    });
    const searchBody = await run.fetchText(`${API_URL}?${params.toString()}`, { headers: { Accept: 'application/json' } });
    const hit = pickRegistryHit(searchBody, profile.targetIdentity, this.matchThreshold);
    if (!hit) return [];

    const entityBody = await run.fetchText(`${ENTITY_URL}/${encodeURIComponent(hit.id)}.json`, {
      headers: { Accept: 'application/json' },
    });
    const draft = parseRegistryEntity(entityBody, hit.id);
    if (!draft) {
      run.warn(`Registry entity ${hit.id} had no English label`);
      return [];
    }
    return [draft];
  }
}
