import { EntityMatcher } from '../src/application/services/EntityMatcher.js';
import { JobLedger } from '../src/application/services/JobLedger.js';
import { Orchestrator, OrchestratorOptions, computeRecordId } from '../src/application/services/Orchestrator.js';
import { DEFAULT_STOP_LIMITS } from '../src/application/services/StopPolicy.js';
import { StrategyPlanner } from '../src/application/services/StrategyPlanner.js';
import { Synthesizer } from '../src/application/services/Synthesizer.js';
import { StrategyId } from '../src/core/entities/Strategy.js';
import { ResearchStrategy } from '../src/core/interfaces/IStrategy.js';
import { PermanentClientError } from '../src/core/errors.js';
import { ResponseCache } from '../src/infrastructure/cache/ResponseCache.js';
import { RateLimiter } from '../src/infrastructure/ratelimit/RateLimiter.js';
import { StrategyRegistry } from '../src/infrastructure/strategies/StrategyRegistry.js';
import { RetryExecutor } from '../src/utils/retry.js';
import { FakeStrategy, InMemoryEntityRepository, InMemoryJobRepository, draft } from './helpers/fakes.js';
import { ManualClock, flush } from './helpers/ManualClock.js';

describe('Orchestrator', () => {
  let clock: ManualClock;
  let jobRepository: InMemoryJobRepository;
  let entityRepository: InMemoryEntityRepository;
  let ledger: JobLedger;
  let nextId: number;

  beforeEach(() => {
    clock = new ManualClock();
    jobRepository = new InMemoryJobRepository();
    entityRepository = new InMemoryEntityRepository();
    nextId = 0;
    ledger = new JobLedger(jobRepository, clock, () => `job-${++nextId}`);
  });

  function createOrchestrator(strategies: ResearchStrategy[], options: Partial<OrchestratorOptions> = {}): Orchestrator {
    const rateLimiter = new RateLimiter({ defaults: { maxConcurrent: 2, requestsPerSecond: 0 }, clock });
    return new Orchestrator(
      {
        ledger,
        planner: new StrategyPlanner(() => true),
        registry: new StrategyRegistry(strategies),
        matcher: new EntityMatcher(),
        synthesizer: new Synthesizer(),
        jobRepository,
        entityRepository,
        resources: {
          rateLimiter,
          retryExecutor: new RetryExecutor({ rateLimiter, clock, random: () => 0.5 }),
          cache: new ResponseCache<string>({ defaultTtlMs: 1000, maxEntries: 10, clock }),
        },
        clock,
      },
      options
    );
  }

  // Investor "Acme Capital" with no known attributes plans these overrides as
  // news_search (6), official_website (5), sec_edgar (5)
  function createJob(strategies: StrategyId[]): string {
    return ledger.create({ targetIdentity: 'Acme Capital', targetType: 'investor', strategyOverride: strategies }).id;
  }

  test('merges a filing and a website into one entity', async () => {
    const filing = new FakeStrategy({
      id: 'sec_edgar',
      sourceType: 'regulatory-filing',
      records: [draft('Acme Capital, LLC', 'regulatory-filing', { aum: 500_000_000 })],
    });
    const website = new FakeStrategy({
      id: 'official_website',
      sourceType: 'first-party-content',
      records: [draft('Acme Capital', 'first-party-content', { website: 'acmecap.com' })],
    });
    const news = new FakeStrategy({ id: 'news_search', sourceType: 'press-news', records: [] });
    const orchestrator = createOrchestrator([filing, website, news]);

    const job = await orchestrator.run(createJob(['sec_edgar', 'official_website', 'news_search']));

    expect(job.status).toBe('success');
    expect(job.planned.map((p) => p.strategyId)).toEqual(['news_search', 'official_website', 'sec_edgar']);
    expect(job.summary).toEqual({
      strategiesTried: 3,
      strategiesSucceeded: 3,
      entitiesFound: 1,
      newEntities: 1,
      updatedEntities: 0,
      totalRequests: 3,
      wallTimeMs: 0,
      stopReason: 'plan_exhausted',
    });

    const entity = entityRepository.getByKey('acme capital');
    expect(entity).toMatchObject({
      attributes: { name: 'Acme Capital, LLC', aum: 500_000_000, website: 'acmecap.com' },
      completeness: 60,
      confidence: 0.747,
      sourceCount: 2,
    });
    expect(entityRepository.count()).toBe(1);
    expect(jobRepository.loadCandidateRecords(job.id)).toHaveLength(2);

    const kinds = job.reasoning.map((r) => r.kind);
    expect(kinds[0]).toBe('plan');
    expect(kinds.filter((k) => k === 'match')).toHaveLength(2);
    expect(kinds[kinds.length - 1]).toBe('finalize');
    expect(job.reasoning.map((r) => r.seq)).toEqual(job.reasoning.map((_, i) => i + 1));
  });

  test('stops dispatching once coverage is sufficient', async () => {
    const full = { aum: 1_000_000_000, website: 'acmecap.com', location: 'Boston', investorCategory: 'hedge_fund' };
    const news = new FakeStrategy({ id: 'news_search', sourceType: 'press-news', records: [draft('Acme Capital', 'press-news', full)] });
    const website = new FakeStrategy({
      id: 'official_website',
      sourceType: 'first-party-content',
      records: [draft('Acme Capital', 'first-party-content', { website: 'acmecap.com' })],
    });
    const filing = new FakeStrategy({ id: 'sec_edgar', sourceType: 'regulatory-filing', records: [] });
    const orchestrator = createOrchestrator([news, website, filing], { maxParallelStrategies: 1 });

    const job = await orchestrator.run(createJob(['sec_edgar', 'official_website', 'news_search']));

    expect(job.status).toBe('success');
    expect(job.summary?.stopReason).toBe('sufficient_coverage');
    expect(job.completed).toEqual(['news_search', 'official_website']);
    expect(filing.calls).toBe(0);
    expect(job.reasoning.some((r) => r.kind === 'evaluate' && r.outcome.startsWith('stop: sufficient_coverage'))).toBe(true);
  });

  test('a timed-out strategy fails while the others still count', async () => {
    const registry = new FakeStrategy({
      id: 'wikidata_registry',
      sourceType: 'structured-registry',
      records: [draft('Acme Capital', 'structured-registry', { location: 'Boston' })],
    });
    const slow = new FakeStrategy({ id: 'news_search', sourceType: 'press-news', durationMs: 200_000, clock });
    const orchestrator = createOrchestrator([registry, slow], { strategyTimeoutMs: 1000 });

    const job = await clock.settle(orchestrator.run(createJob(['news_search', 'wikidata_registry'])));

    expect(job.status).toBe('partial_success');
    expect(job.summary?.stopReason).toBe('plan_exhausted');
    const timedOut = job.attempts.find((a) => a.strategyId === 'news_search');
    expect(timedOut).toMatchObject({
      outcome: 'failed',
      errorKind: 'strategy_timeout',
      error: 'Strategy news_search timed out after 1000ms',
    });
    expect(slow.lastSignal?.aborted).toBe(true);
    expect(job.errors).toHaveLength(1);
  });

  test('a rejected strategy is classified from its error', async () => {
    const broken: ResearchStrategy = {
      id: 'sec_edgar',
      displayName: 'Broken',
      sourceType: 'regulatory-filing',
      targetKey: 'broken',
      execute: () => Promise.reject(new PermanentClientError('HTTP 404 Not Found for https://source.test', 404)),
    };
    const orchestrator = createOrchestrator([broken]);

    const job = await orchestrator.run(createJob(['sec_edgar']));

    expect(job.status).toBe('failed');
    expect(job.attempts[0]).toMatchObject({ outcome: 'failed', errorKind: 'permanent_client', recordCount: 0 });
    expect(job.errors[0]).toMatchObject({ strategyId: 'sec_edgar', kind: 'permanent_client' });
  });

  test('an unregistered strategy fails its attempt', async () => {
    const orchestrator = createOrchestrator([]);
    const job = await orchestrator.run(createJob(['annual_report']));

    expect(job.attempts[0]).toMatchObject({ outcome: 'failed', errorKind: 'unknown', error: 'Strategy annual_report is not registered' });
    expect(job.status).toBe('failed');
  });

  test('cancelling a running job lets the in-flight strategy finish and skips the rest', async () => {
    const first = new FakeStrategy({
      id: 'news_search',
      sourceType: 'press-news',
      records: [draft('Acme Capital', 'press-news', { location: 'Boston' })],
      durationMs: 5000,
      clock,
    });
    const second = new FakeStrategy({ id: 'sec_edgar', sourceType: 'regulatory-filing' });
    const orchestrator = createOrchestrator([first, second], { maxParallelStrategies: 1 });
    const jobId = createJob(['news_search', 'sec_edgar']);

    const running = orchestrator.run(jobId);
    await flush();
    expect(first.calls).toBe(1);
    expect(orchestrator.requestCancel(jobId)).toBe(true);
    expect(orchestrator.requestCancel(jobId)).toBe(true);

    const job = await clock.settle(running);

    expect(job.status).toBe('failed');
    expect(job.summary?.stopReason).toBe('cancelled');
    expect(job.completed).toEqual(['news_search']);
    expect(second.calls).toBe(0);
    expect(job.reasoning.filter((r) => r.kind === 'cancel')).toHaveLength(1);
    expect(orchestrator.isCancelRequested(jobId)).toBe(false);
    expect(orchestrator.requestCancel(jobId)).toBe(false);
  });

  test('a job cancelled before it starts never plans', async () => {
    const strategy = new FakeStrategy({ id: 'news_search', sourceType: 'press-news' });
    const orchestrator = createOrchestrator([strategy]);
    const jobId = createJob(['news_search']);

    expect(orchestrator.requestCancel(jobId)).toBe(true);
    const job = await orchestrator.run(jobId);

    expect(job.status).toBe('failed');
    expect(job.planned).toEqual([]);
    expect(job.summary).toMatchObject({ stopReason: 'cancelled', strategiesTried: 0 });
    expect(strategy.calls).toBe(0);
  });

  test('rerunning the same research does not change stored entities', async () => {
    const filing = new FakeStrategy({
      id: 'sec_edgar',
      sourceType: 'regulatory-filing',
      records: [draft('Acme Capital, LLC', 'regulatory-filing', { aum: 500_000_000 })],
    });
    const orchestrator = createOrchestrator([filing]);

    const first = await orchestrator.run(createJob(['sec_edgar']));
    const second = await orchestrator.run(createJob(['sec_edgar']));

    expect(first.summary).toMatchObject({ newEntities: 1, updatedEntities: 0 });
    expect(second.summary).toMatchObject({ newEntities: 0, updatedEntities: 0 });
    expect(entityRepository.upserts).toBe(1);
    expect(await orchestrator.run(first.id)).toEqual(first);
  });

  test('duplicate and nameless drafts are dropped when stamping', async () => {
    const noisy = new FakeStrategy({
      id: 'news_search',
      sourceType: 'press-news',
      records: [
        draft('Acme Capital', 'press-news', { location: 'Boston' }),
        draft('Acme Capital ', 'press-news', { location: ' Boston ' }),
        draft('   ', 'press-news', { location: 'Denver' }),
      ],
    });
    const orchestrator = createOrchestrator([noisy]);

    const job = await orchestrator.run(createJob(['news_search']));

    expect(job.attempts[0].recordCount).toBe(1);
    const [stored] = jobRepository.loadCandidateRecords(job.id);
    expect(stored).toMatchObject({ rawName: 'Acme Capital', normalizedKey: 'acme capital', attributes: { location: 'Boston' } });
    expect(Object.isFrozen(stored)).toBe(true);
  });

  test('the merged key does not depend on which strategy finishes first', async () => {
    async function research(newsMs: number, filingMs: number) {
      entityRepository = new InMemoryEntityRepository();
      const news = new FakeStrategy({
        id: 'news_search',
        sourceType: 'press-news',
        records: [draft('Acme Capital Partner', 'press-news', { location: 'Boston' })],
        durationMs: newsMs,
        clock,
      });
      const filing = new FakeStrategy({
        id: 'sec_edgar',
        sourceType: 'regulatory-filing',
        records: [draft('Acme Capital Partners', 'regulatory-filing', { aum: 500_000_000 })],
        durationMs: filingMs,
        clock,
      });
      await clock.settle(createOrchestrator([news, filing]).run(createJob(['news_search', 'sec_edgar'])));
      return entityRepository.getAll().map((e) => [e.normalizedKey, e.attributes.name]);
    }

    const newsFirst = await research(1000, 2000);
    const filingFirst = await research(2000, 1000);

    expect(newsFirst).toEqual([['acme capital partners', 'Acme Capital Partners']]);
    expect(filingFirst).toEqual(newsFirst);
  });

  test('a later job joins a stored entity through a shared identifier', async () => {
    const filing = new FakeStrategy({
      id: 'sec_edgar',
      sourceType: 'regulatory-filing',
      records: [draft('Acme Capital Partners', 'regulatory-filing', { cik: '123' })],
    });
    const news = new FakeStrategy({
      id: 'news_search',
      sourceType: 'press-news',
      records: [draft('ACP Holdings Group', 'press-news', { cik: '0000123', location: 'Boston' })],
    });
    const orchestrator = createOrchestrator([filing, news]);

    await orchestrator.run(createJob(['sec_edgar']));
    const second = await orchestrator.run(createJob(['news_search']));

    expect(second.summary).toMatchObject({ newEntities: 0, updatedEntities: 1 });
    expect(entityRepository.getAll().map((e) => e.normalizedKey)).toEqual(['acme capital partners']);
    expect(entityRepository.getByKey('acme capital partners')).toMatchObject({
      attributes: { name: 'Acme Capital Partners', cik: '123', location: 'Boston' },
      sourceCount: 2,
    });
  });

  test('a company never folds into an investor with the same name', async () => {
    const filing = new FakeStrategy({
      id: 'sec_edgar',
      sourceType: 'regulatory-filing',
      records: [draft('Acme Capital', 'regulatory-filing', { aum: 500_000_000 })],
    });
    const website = new FakeStrategy({
      id: 'official_website',
      sourceType: 'first-party-content',
      records: [draft('Acme Capital', 'first-party-content', { industry: 'Software' })],
    });
    const orchestrator = createOrchestrator([filing, website]);

    await orchestrator.run(createJob(['sec_edgar']));
    const companyJob = ledger.create({ targetIdentity: 'Acme Capital', targetType: 'company', strategyOverride: ['official_website'] });
    const second = await orchestrator.run(companyJob.id);

    expect(second.summary).toMatchObject({ newEntities: 1, updatedEntities: 0 });
    expect(entityRepository.count()).toBe(2);
    expect(entityRepository.getByKey('acme capital', 'investor')?.attributes).toEqual({ name: 'Acme Capital', aum: 500_000_000 });
    expect(entityRepository.getByKey('acme capital', 'company')?.attributes).toEqual({ name: 'Acme Capital', industry: 'Software' });
  });

  test('one job keeps same-named entities of different types apart', async () => {
    const news = new FakeStrategy({
      id: 'news_search',
      sourceType: 'press-news',
      records: [
        draft('Acme Capital', 'press-news', { location: 'Boston' }),
        { ...draft('Acme Capital', 'press-news', { industry: 'Software' }), entityType: 'company' },
      ],
    });
    const orchestrator = createOrchestrator([news]);

    const job = await orchestrator.run(createJob(['news_search']));

    expect(job.summary).toMatchObject({ entitiesFound: 2, newEntities: 2 });
    expect(entityRepository.getByKey('acme capital', 'investor')?.attributes).toEqual({ name: 'Acme Capital', location: 'Boston' });
    expect(entityRepository.getByKey('acme capital', 'company')?.attributes).toEqual({ name: 'Acme Capital', industry: 'Software' });
  });

  test('parallel dispatch never exceeds the strategy budget', async () => {
    const strategies = (['news_search', 'official_website', 'sec_edgar'] as const).map(
      (id) =>
        new FakeStrategy({
          id,
          sourceType: 'press-news',
          records: [draft('Acme Capital', 'press-news', { location: `Office of ${id}` })],
          durationMs: 1000,
          clock,
        })
    );
    const orchestrator = createOrchestrator(strategies, {
      maxParallelStrategies: 3,
      stopLimits: { ...DEFAULT_STOP_LIMITS, maxStrategiesPerJob: 2 },
    });

    const job = await clock.settle(orchestrator.run(createJob(['news_search', 'official_website', 'sec_edgar'])));

    expect(strategies.reduce((sum, s) => sum + s.calls, 0)).toBe(2);
    expect(job.status).toBe('partial_success');
    expect(job.summary).toMatchObject({ strategiesTried: 2, stopReason: 'budget_exhausted' });
  });

  test('a job that finds nothing stops after the no-data limit and fails', async () => {
    const ids = ['sec_edgar', 'annual_report', 'wikidata_registry', 'official_website', 'news_search'] as const;
    const strategies = ids.map((id) => new FakeStrategy({ id, sourceType: 'press-news', records: [] }));
    const orchestrator = createOrchestrator(strategies, { maxParallelStrategies: 1 });

    const job = await orchestrator.run(createJob([...ids]));

    expect(job.status).toBe('failed');
    expect(job.summary).toMatchObject({ strategiesTried: 4, stopReason: 'no_data_found', entitiesFound: 0 });
    expect(strategies.filter((s) => s.calls === 0)).toHaveLength(1);
  });

  test('a job over its time limit stops with what it has', async () => {
    const slow = new FakeStrategy({
      id: 'news_search',
      sourceType: 'press-news',
      records: [draft('Acme Capital', 'press-news', { location: 'Boston' })],
      durationMs: 6000,
      clock,
    });
    const next = new FakeStrategy({ id: 'sec_edgar', sourceType: 'regulatory-filing' });
    const orchestrator = createOrchestrator([slow, next], {
      maxParallelStrategies: 1,
      stopLimits: { ...DEFAULT_STOP_LIMITS, maxJobDurationMs: 5000 },
    });

    const job = await clock.settle(orchestrator.run(createJob(['news_search', 'sec_edgar'])));

    expect(job.status).toBe('partial_success');
    expect(job.summary).toMatchObject({ strategiesTried: 1, stopReason: 'time_exceeded', wallTimeMs: 6000 });
    expect(next.calls).toBe(0);
  });
});

describe('computeRecordId', () => {
  test('ignores attribute order and surrounding whitespace', () => {
    const a = computeRecordId('sec_edgar', draft('Acme Capital', 'regulatory-filing', { aum: 5, cik: '123' }));
    const b = computeRecordId('sec_edgar', draft(' Acme Capital ', 'regulatory-filing', { cik: ' 123 ', aum: 5 }));
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{16}$/);
  });

  test('depends on the strategy and the content', () => {
    const base = draft('Acme Capital', 'regulatory-filing', { aum: 5 });
    expect(computeRecordId('sec_edgar', base)).not.toBe(computeRecordId('annual_report', base));
    expect(computeRecordId('sec_edgar', base)).not.toBe(computeRecordId('sec_edgar', { ...base, attributes: { aum: 6 } }));
  });
});
