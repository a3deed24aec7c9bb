import { Attributes, AttributeValue, EntityType } from '../../core/entities/CandidateRecord.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('EntityMatcher');

// Stripped from the end (after a space or comma) until the name stops changing
const ORGANIZATION_SUFFIXES: RegExp[] = [
  'inc\\.?|incorporated',
  'llc|l\\.l\\.c\\.',
  'ltd\\.?|limited',
  'corp\\.?|corporation',
  'co\\.?|company',
  'plc|p\\.l\\.c\\.',
  's\\.a\\.?|sa',
  'n\\.v\\.?|nv',
  'ag',
  'gmbh',
  'lp|l\\.p\\.',
  'llp|l\\.l\\.p\\.',
  'pllc',
  'the',
].map((alternatives) => new RegExp(`(?:^|[\\s,]+)(?:${alternatives})$`));

const LEADING_ARTICLE = /^the\s+/;

const ABBREVIATIONS: Record<string, string> = {
  intl: 'international',
  corp: 'corporation',
  assoc: 'associates',
  mgmt: 'management',
  svcs: 'services',
  tech: 'technology',
  sys: 'systems',
  grp: 'group',
  hldgs: 'holdings',
  invt: 'investment',
  invts: 'investments',
  ptnrs: 'partners',
  ptr: 'partners',
};

export const DEFAULT_IDENTIFIER_FIELDS = ['cik', 'lei', 'ein', 'crd', 'ticker'] as const;

/**
 * Minimum single-character edits turning `a` into `b`
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length < b.length) return levenshteinDistance(b, a);
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 0; i < a.length; i++) {
    const current = [i + 1];
    for (let j = 0; j < b.length; j++) {
      const substitution = previous[j] + (a[i] === b[j] ? 0 : 1);
      current.push(Math.min(previous[j + 1] + 1, current[j] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}

export function similarityRatio(a: string, b: string): number {
  if (!a && !b) return 1;
  if (!a || !b) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

/**
 * Canonical form used as an entity key: "Acme Capital, LLC" -> "acme capital"
 */
export function normalizeName(name: string): string {
  let normalized = name.toLowerCase().trim();

  let previous: string;
  do {
    previous = normalized;
    for (const suffix of ORGANIZATION_SUFFIXES) {
      normalized = normalized.replace(suffix, '').trim();
    }
    normalized = normalized.replace(LEADING_ARTICLE, '');
  } while (normalized !== previous);

  normalized = normalized
    .split(/\s+/)
    .map((word) => ABBREVIATIONS[word.replace(/[^\w]/g, '')] ?? word)
    .join(' ');

  return normalized
    .replace(/[^\w\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Similarity of two normalized names, tolerant of reordered words
 */
export function nameSimilarity(a: string, b: string): number {
  const sortTokens = (value: string) => value.split(' ').filter(Boolean).sort().join(' ');
  return Math.max(similarityRatio(a, b), similarityRatio(sortTokens(a), sortTokens(b)));
}

function canonicalIdentifier(value: AttributeValue): string {
  const text = String(value).trim().toLowerCase();
  return /^\d+$/.test(text) ? text.replace(/^0+(?=\d)/, '') : text;
}

export interface MatchCandidate {
  name: string;
  entityType?: EntityType;
  attributes: Readonly<Attributes>;
}

/**
 * What the matcher needs to know about an entity already in scope
 */
export interface MatchTarget {
  normalizedKey: string;
  entityType: EntityType;
  attributes: Readonly<Attributes>;
  records: readonly unknown[];
}

export type MatchReason = 'identifier' | 'exact' | 'fuzzy' | 'new';

export interface MatchResult {
  key: string;
  isNew: boolean;
  similarity: number;
  reason: MatchReason;
  ambiguous: boolean;
  ambiguityReason?: 'tie' | 'identifier_conflict';
  /** Every other key that tied with the chosen one */
  alternatives: string[];
}

export interface EntityMatcherOptions {
  fuzzyMatchThreshold?: number;
  identifierFields?: readonly string[];
}

/**
 * Decides which existing entity a candidate belongs to, or that it is new
 */
export class EntityMatcher {
  readonly threshold: number;
  private readonly identifierFields: readonly string[];

  constructor(options: EntityMatcherOptions = {}) {
    this.threshold = options.fuzzyMatchThreshold ?? 0.85;
    this.identifierFields = options.identifierFields ?? DEFAULT_IDENTIFIER_FIELDS;
  }

  normalize(name: string): string {
    return normalizeName(name) || name.toLowerCase().trim();
  }

  match(candidate: MatchCandidate, existing: readonly MatchTarget[]): MatchResult {
    const key = this.normalize(candidate.name);
    const pool = existing.filter((target) => !candidate.entityType || target.entityType === candidate.entityType);

    const byIdentifier = pool.filter((target) => this.sharesIdentifier(candidate.attributes, target.attributes));
    if (byIdentifier.length > 0) {
      return this.choose(key, byIdentifier, 'identifier', candidate);
    }

    const exact = pool.filter((target) => target.normalizedKey === key);
    if (exact.length > 0) {
      return this.choose(key, exact, 'exact', candidate);
    }

    let best = 0;
    let contenders: MatchTarget[] = [];
    for (const target of pool) {
      const score = nameSimilarity(key, target.normalizedKey);
      if (score < this.threshold) continue;
      if (score > best) {
        best = score;
        contenders = [target];
      } else if (score === best) {
        contenders.push(target);
      }
    }
    if (contenders.length > 0) {
      return this.choose(key, contenders, 'fuzzy', candidate);
    }

    return { key, isNew: true, similarity: 0, reason: 'new', ambiguous: false, alternatives: [] };
  }

  private choose(key: string, contenders: MatchTarget[], reason: MatchReason, candidate: MatchCandidate): MatchResult {
    const ordered = [...contenders].sort(
      (a, b) =>
        b.records.length - a.records.length || (a.normalizedKey < b.normalizedKey ? -1 : a.normalizedKey > b.normalizedKey ? 1 : 0)
    );
    const chosen = ordered[0];
    const alternatives = ordered.slice(1).map((target) => target.normalizedKey);

    let ambiguityReason: MatchResult['ambiguityReason'];
    if (alternatives.length > 0) {
      ambiguityReason = 'tie';
    } else if (reason !== 'identifier' && this.conflictingIdentifier(candidate.attributes, chosen.attributes)) {
      ambiguityReason = 'identifier_conflict';
    }

    const result: MatchResult = {
      key: chosen.normalizedKey,
      isNew: false,
      similarity: Math.round(nameSimilarity(key, chosen.normalizedKey) * 1000) / 1000,
      reason,
      ambiguous: ambiguityReason !== undefined,
      ambiguityReason,
      alternatives,
    };

    if (result.ambiguous) {
      log.warn(`Ambiguous match for "${candidate.name}" -> ${result.key}`, {
        reason: ambiguityReason,
        alternatives,
      });
    }
    return result;
  }

  private sharesIdentifier(a: Readonly<Attributes>, b: Readonly<Attributes>): boolean {
    return this.identifierFields.some((field) => {
      const left = a[field];
      const right = b[field];
      return left !== undefined && right !== undefined && canonicalIdentifier(left) === canonicalIdentifier(right);
    });
  }

  private conflictingIdentifier(a: Readonly<Attributes>, b: Readonly<Attributes>): boolean {
    return this.identifierFields.some((field) => {
      const left = a[field];
      const right = b[field];
      return left !== undefined && right !== undefined && canonicalIdentifier(left) !== canonicalIdentifier(right);
    });
  }
}
