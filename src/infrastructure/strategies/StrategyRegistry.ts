import { StrategyId } from '../../core/entities/Strategy.js';
import { ResearchStrategy } from '../../core/interfaces/IStrategy.js';

/**
 * Resolves strategy ids to instances at plan and dispatch time
 */
export class StrategyRegistry {
  private readonly strategies = new Map<StrategyId, ResearchStrategy>();

  constructor(strategies: readonly ResearchStrategy[] = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  register(strategy: ResearchStrategy): void {
    this.strategies.set(strategy.id, strategy);
  }

  has(id: StrategyId): boolean {
    return this.strategies.has(id);
  }

  get(id: StrategyId): ResearchStrategy | undefined {
    return this.strategies.get(id);
  }

  list(): ResearchStrategy[] {
    return Array.from(this.strategies.values());
  }
}
