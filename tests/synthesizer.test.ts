import {
  Synthesizer,
  computeCompleteness,
  computeConfidence,
} from '../src/application/services/Synthesizer.js';
import { Attributes, CandidateRecord, ConfidenceLevel, SourceType } from '../src/core/entities/CandidateRecord.js';
import { MergedEntity } from '../src/core/entities/MergedEntity.js';

function record(
  id: string,
  sourceType: SourceType,
  rawName: string,
  attributes: Attributes,
  confidence: ConfidenceLevel = 'high'
): CandidateRecord {
  return Object.freeze({
    id,
    jobId: 'job-1',
    strategyId: 'test',
    normalizedKey: 'acme capital',
    rawName,
    entityType: 'investor',
    attributes: Object.freeze({ ...attributes }),
    sourceType,
    sourceUrl: `https://source.test/${id}`,
    confidence,
    collectedAt: new Date(0),
  });
}

const filing = record('a1', 'regulatory-filing', 'Acme Capital, LLC', { aum: 500_000_000 });
const website = record('b1', 'first-party-content', 'Acme Capital', { website: 'acmecap.com' });

function mergeAll(synthesizer: Synthesizer, records: CandidateRecord[]): MergedEntity | null {
  return records.reduce<MergedEntity | null>((entity, r) => synthesizer.merge(entity, r), null);
}

describe('Synthesizer', () => {
  const synthesizer = new Synthesizer();

  test('merges a filing and a website into one investor', () => {
    const entity = mergeAll(synthesizer, [filing, website]);

    expect(entity).toMatchObject({
      normalizedKey: 'acme capital',
      entityType: 'investor',
      attributes: { name: 'Acme Capital, LLC', aum: 500_000_000, website: 'acmecap.com' },
      completeness: 60,
      confidence: 0.747,
      sourceCount: 2,
    });
    expect(entity?.provenance).toEqual([
      { field: 'aum', value: 500_000_000, recordId: 'a1', sourceType: 'regulatory-filing', sourceUrl: 'https://source.test/a1', sourceRank: 0 },
      { field: 'name', value: 'Acme Capital, LLC', recordId: 'a1', sourceType: 'regulatory-filing', sourceUrl: 'https://source.test/a1', sourceRank: 0 },
      { field: 'website', value: 'acmecap.com', recordId: 'b1', sourceType: 'first-party-content', sourceUrl: 'https://source.test/b1', sourceRank: 3 },
    ]);
  });

  test('arrival order does not change the result', () => {
    const press = record('c1', 'press-news', 'Acme Capital Partners', { aum: 450_000_000, location: 'Boston' }, 'medium');
    const forward = mergeAll(synthesizer, [filing, website, press]);
    const backward = mergeAll(synthesizer, [press, website, filing]);
    expect(backward).toEqual(forward);
    expect(forward?.attributes.aum).toBe(500_000_000);
    expect(forward?.attributes.location).toBe('Boston');
  });

  test('a higher-priority source replaces a field, a lower one never does', () => {
    const press = record('c1', 'press-news', 'Acme', { aum: 1 }, 'high');
    const afterPress = synthesizer.merge(null, press);
    expect(afterPress.attributes.aum).toBe(1);

    const afterFiling = synthesizer.merge(afterPress, filing);
    expect(afterFiling.attributes.aum).toBe(500_000_000);

    const inferred = record('d1', 'inferred-signal', 'Acme', { aum: 2 }, 'high');
    expect(synthesizer.merge(afterFiling, inferred).attributes.aum).toBe(500_000_000);
  });

  test('within one source type, higher confidence wins, then the smaller record id', () => {
    const low = record('a0', 'press-news', 'Acme', { location: 'Denver' }, 'low');
    const high = record('z9', 'press-news', 'Acme', { location: 'Austin' }, 'high');
    expect(mergeAll(synthesizer, [low, high])?.attributes.location).toBe('Austin');

    const first = record('m1', 'press-news', 'Acme', { location: 'Austin' }, 'medium');
    const second = record('m2', 'press-news', 'Acme', { location: 'Denver' }, 'medium');
    expect(mergeAll(synthesizer, [second, first])?.attributes.location).toBe('Austin');
  });

  test('blank values never overwrite', () => {
    const blank = record('a0', 'regulatory-filing', 'Acme', { website: '   ' });
    expect(mergeAll(synthesizer, [website, blank])?.attributes.website).toBe('acmecap.com');
  });

  test('merging a record twice is a no-op', () => {
    const once = synthesizer.merge(null, filing);
    expect(synthesizer.merge(once, filing)).toBe(once);
  });

  test('a custom source priority changes the winner', () => {
    const newsFirst = new Synthesizer({ sourcePriority: ['press-news', 'regulatory-filing'] });
    const press = record('c1', 'press-news', 'Acme', { aum: 7 });
    const entity = mergeAll(newsFirst, [filing, press]);
    expect(entity?.attributes.aum).toBe(7);
    expect(newsFirst.rankOf('structured-registry')).toBe(2);
  });

  test('fold adds only records the stored entity lacks', () => {
    const stored = synthesizer.merge(null, filing);
    const incoming = mergeAll(synthesizer, [filing, website]);
    if (!incoming) throw new Error('expected an entity');

    const folded = synthesizer.fold(stored, incoming);
    expect(folded.isNew).toBe(false);
    expect(folded.changed).toBe(true);
    expect(folded.entity.records.map((r) => r.id)).toEqual(['a1', 'b1']);

    const again = synthesizer.fold(folded.entity, incoming);
    expect(again).toEqual({ entity: folded.entity, isNew: false, changed: false });

    expect(synthesizer.fold(null, incoming)).toEqual({ entity: incoming, isNew: true, changed: true });
  });
});

describe('scores', () => {
  test('completeness counts populated required fields', () => {
    expect(computeCompleteness('investor', {})).toBe(0);
    expect(computeCompleteness('company', { name: 'Globex', website: 'globex.test', industry: '' })).toBe(40);
    expect(
      computeCompleteness('company', { name: 'G', website: 'w', industry: 'i', location: 'l', description: 'd' })
    ).toBe(100);
  });

  test('confidence stays within bounds', () => {
    expect(computeConfidence(0, true, 100)).toBe(0);
    expect(computeConfidence(1, false, 0)).toBe(0.133);
    expect(computeConfidence(6, true, 100)).toBe(1);
  });
});
