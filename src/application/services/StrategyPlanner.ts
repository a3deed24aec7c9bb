import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { PlannedStrategy } from '../../core/entities/Job.js';
import { StrategyId } from '../../core/entities/Strategy.js';

export interface RuleProposal {
  priority: number;
  expectedConfidence: number;
  rationale: string;
}

/**
 * Inspects a profile and proposes its strategy, or declines with null
 */
export interface PlanningRule {
  strategyId: StrategyId;
  propose(profile: EntityProfile): RuleProposal | null;
}

const BILLION = 1_000_000_000;

function numberAttr(profile: EntityProfile, field: string): number | undefined {
  const value = profile.attributes[field];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return undefined;
}

function stringAttr(profile: EntityProfile, field: string): string | undefined {
  const value = profile.attributes[field];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function category(profile: EntityProfile): string | undefined {
  return stringAttr(profile, 'investorCategory')?.toLowerCase().replace(/[\s-]+/g, '_');
}

function nameHas(profile: EntityProfile, keywords: string[]): string | undefined {
  const name = profile.targetIdentity.toLowerCase();
  return keywords.find((keyword) => name.includes(keyword));
}

export function isHttpUrl(value: string | undefined): boolean {
  if (!value) return false;
  try {
    const url = new URL(/^https?:\/\//i.test(value) ? value : `https://${value}`);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.includes('.');
  } catch {
    return false;
  }
}

const secEdgarRule: PlanningRule = {
  strategyId: 'sec_edgar',
  propose(profile) {
    const aum = numberAttr(profile, 'aum');
    const kind = category(profile);
    const cik = stringAttr(profile, 'cik') ?? numberAttr(profile, 'cik');
    const ticker = stringAttr(profile, 'ticker');

    let rationale: string | undefined;
    if (cik !== undefined) rationale = `CIK ${cik} is known`;
    else if (ticker) rationale = `Ticker ${ticker} is known`;
    else if (profile.targetType === 'investor' && aum !== undefined && aum >= 100_000_000)
      rationale = `AUM $${(aum / BILLION).toFixed(1)}B is over the $100M 13F threshold`;
    else if (kind === 'public_pension' || kind === 'sovereign_wealth' || kind === 'endowment')
      rationale = `${kind} investors typically file with the SEC`;
    else {
      const keyword = nameHas(profile, ['pension', 'retirement', 'endowment', 'foundation', 'trust']);
      if (keyword) rationale = `Name contains "${keyword}", suggesting an institutional filer`;
    }
    if (!rationale) return null;

    let priority = 7;
    if (aum !== undefined && aum >= 10 * BILLION) priority = 9;
    else if (aum !== undefined && aum >= BILLION) priority = 8;
    if ((aum !== undefined && aum >= 100 * BILLION) || kind === 'public_pension' || cik !== undefined) priority = 10;

    return { priority, expectedConfidence: cik !== undefined || ticker ? 0.9 : 0.8, rationale };
  },
};

const annualReportRule: PlanningRule = {
  strategyId: 'annual_report',
  propose(profile) {
    const kind = category(profile);
    if (kind === 'public_pension') {
      return { priority: 10, expectedConfidence: 0.85, rationale: 'Public pensions publish annual financial reports' };
    }
    if (kind === 'endowment') {
      return { priority: 8, expectedConfidence: 0.8, rationale: 'Endowments typically publish annual investment reports' };
    }
    if (kind === 'foundation') {
      return { priority: 6, expectedConfidence: 0.75, rationale: 'Foundations often publish annual reports' };
    }
    if (isHttpUrl(stringAttr(profile, 'website'))) {
      const keyword = nameHas(profile, ['pension', 'retirement', 'state', 'city', 'county', 'university']);
      if (keyword) {
        return { priority: 6, expectedConfidence: 0.7, rationale: `Name contains "${keyword}", suggesting a public entity with reports` };
      }
    }
    return null;
  },
};

const wikidataRegistryRule: PlanningRule = {
  strategyId: 'wikidata_registry',
  propose(profile) {
    return profile.targetType === 'company'
      ? { priority: 7, expectedConfidence: 0.7, rationale: 'Companies are commonly listed in the public registry' }
      : { priority: 6, expectedConfidence: 0.6, rationale: 'Registry lookup is cheap and always worth trying' };
  },
};

const officialWebsiteRule: PlanningRule = {
  strategyId: 'official_website',
  propose(profile) {
    const website = stringAttr(profile, 'website');
    if (!isHttpUrl(website)) return null;
    const kind = category(profile);
    const priority = kind === 'public_pension' ? 8 : kind === 'family_office' ? 5 : 6;
    return { priority, expectedConfidence: 0.7, rationale: `Website ${website} is known` };
  },
};

const newsSearchRule: PlanningRule = {
  strategyId: 'news_search',
  propose(profile) {
    const kind = category(profile);
    const aum = numberAttr(profile, 'aum');

    let rationale: string | undefined;
    if (kind === 'family_office') rationale = 'Family offices have little public data besides press coverage';
    else if (aum !== undefined && aum >= BILLION) rationale = 'Large investors usually have press coverage';
    else if (profile.targetType === 'company') rationale = 'Companies usually have press coverage';
    else {
      const keyword = nameHas(profile, ['investment', 'capital', 'partners', 'ventures', 'fund']);
      if (keyword) rationale = `Name contains "${keyword}", suggesting an investment firm in the news`;
    }
    if (!rationale) return null;

    const priority = kind === 'family_office' ? 8 : kind === 'public_pension' ? 5 : 6;
    return { priority, expectedConfidence: 0.5, rationale };
  },
};

export const DEFAULT_PLANNING_RULES: readonly PlanningRule[] = [
  secEdgarRule,
  annualReportRule,
  wikidataRegistryRule,
  officialWebsiteRule,
  newsSearchRule,
];

export function comparePlanned(a: PlannedStrategy, b: PlannedStrategy): number {
  return (
    b.priority - a.priority ||
    b.expectedConfidence - a.expectedConfidence ||
    (a.strategyId < b.strategyId ? -1 : a.strategyId > b.strategyId ? 1 : 0)
  );
}

/**
 * Turns a profile into an ordered list of strategies. Never executes anything.
 */
export class StrategyPlanner {
  constructor(
    private readonly isAvailable: (id: StrategyId) => boolean,
    private readonly rules: readonly PlanningRule[] = DEFAULT_PLANNING_RULES
  ) {}

  plan(profile: EntityProfile, override?: readonly StrategyId[]): PlannedStrategy[] {
    const proposals = new Map<StrategyId, RuleProposal>();
    for (const rule of this.rules) {
      const proposal = rule.propose(profile);
      if (proposal && !proposals.has(rule.strategyId)) {
        proposals.set(rule.strategyId, proposal);
      }
    }

    let planned: PlannedStrategy[];
    if (override && override.length > 0) {
      planned = Array.from(new Set(override)).map((strategyId) => {
        const proposal = proposals.get(strategyId);
        return proposal
          ? { strategyId, ...proposal }
          : { strategyId, priority: 5, expectedConfidence: 0.5, rationale: 'Requested explicitly' };
      });
    } else {
      planned = Array.from(proposals.entries()).map(([strategyId, proposal]) => ({ strategyId, ...proposal }));
    }

    return planned.filter((entry) => this.isAvailable(entry.strategyId)).sort(comparePlanned);
  }
}
