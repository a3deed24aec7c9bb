/**
 * The closed set of collection strategies
 */
export const STRATEGY_IDS = [
  'sec_edgar',
  'annual_report',
  'wikidata_registry',
  'official_website',
  'news_search',
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export function isStrategyId(value: string): value is StrategyId {
  return STRATEGY_IDS.some((id) => id === value);
}
