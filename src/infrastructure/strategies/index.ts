import { HttpClient } from '../http/HttpClient.js';
import { AnnualReportStrategy } from './AnnualReportStrategy.js';
import { NewsSearchStrategy } from './NewsSearchStrategy.js';
import { OfficialWebsiteStrategy } from './OfficialWebsiteStrategy.js';
import { SecEdgarStrategy } from './SecEdgarStrategy.js';
import { StrategyRegistry } from './StrategyRegistry.js';
import { WikidataRegistryStrategy } from './WikidataRegistryStrategy.js';

export { StrategyRegistry } from './StrategyRegistry.js';

/**
 * Registry holding every built-in strategy
 */
export function createDefaultRegistry(http: HttpClient, fuzzyMatchThreshold: number): StrategyRegistry {
  return new StrategyRegistry([
    new SecEdgarStrategy(http),
    new AnnualReportStrategy(http),
    new WikidataRegistryStrategy(http, fuzzyMatchThreshold),
    new OfficialWebsiteStrategy(http),
    new NewsSearchStrategy(http),
  ]);
}
