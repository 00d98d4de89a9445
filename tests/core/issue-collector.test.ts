import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ConfigLoadError } from '../../src/config/loader.js';
import { IssueCollector, resolveDateWindow, type CollectOptions } from '../../src/core/issue-collector.js';
import type { FeedQuery } from '../../src/feed/issue-feed.js';
import type { FeedStatus, IssueDetailFields, IssueDraft } from '../../src/issues/types.js';
import { InMemoryIssueStore } from '../helpers/in-memory-issue-store.js';
import {
  asLogger,
  makeIssue,
  makeLogger,
  makePacer,
  makeRuntimeConfig,
  makeSpatial,
} from '../helpers/fixtures.js';

const NOW = new Date('2024-06-10T12:00:00.000Z');

function draft(key: string, overrides: Partial<IssueDraft> = {}): IssueDraft {
  return {
    key,
    status: 'false',
    location: { lat: 45.1, lon: 5.7 },
    classification: { itemId: 7170, classId: 1 },
    source: 12,
    level: 2,
    subtitle: null,
    country: 'france',
    feedUpdatedAt: '2024-06-01 09:00:00+00:00',
    ...overrides,
  };
}

const DETAIL: IssueDetailFields = {
  bbox: { minLat: 45.0, maxLat: 45.2, minLon: 5.6, maxLon: 5.8 },
  reportedAt: '2024-06-01T09:00:00+00:00',
};

const ADMIN = {
  municipalityCode: '38185',
  municipalityName: 'Grenoble',
  departmentCode: '38',
  departmentName: 'Isère',
  regionCode: '84',
  regionName: 'Auvergne-Rhône-Alpes',
};

describe('resolveDateWindow', () => {
  it('defaults to the lookback window ending today', () => {
    expect(resolveDateWindow({ lookbackDays: 31 }, NOW)).toEqual({
      startDate: '2024-05-10',
      endDate: '2024-06-10',
    });
  });

  it('counts the lookback back from an explicit end date', () => {
    expect(resolveDateWindow({ endDate: '2024-03-01', lookbackDays: 10 }, NOW)).toEqual({
      startDate: '2024-02-20',
      endDate: '2024-03-01',
    });
  });

  it('keeps explicit bounds', () => {
    expect(resolveDateWindow({ startDate: '2023-01-01', endDate: '2023-02-01', lookbackDays: 31 }, NOW)).toEqual({
      startDate: '2023-01-01',
      endDate: '2023-02-01',
    });
  });

  it('rejects a start date before 2020', () => {
    expect(() => resolveDateWindow({ startDate: '2019-12-31', lookbackDays: 31 }, NOW)).toThrow(ConfigLoadError);
  });

  it('rejects a start date that is not before the end date', () => {
    expect(() =>
      resolveDateWindow({ startDate: '2024-03-01', endDate: '2024-03-01', lookbackDays: 31 }, NOW),
    ).toThrow('Start date 2024-03-01 must be before end date 2024-03-01');
  });
});

describe('IssueCollector', () => {
  let fetch: Mock<[FeedQuery], Promise<IssueDraft[]>>;
  let fetchDetail: Mock<[string, FeedStatus], Promise<IssueDetailFields | null>>;
  let spatial: ReturnType<typeof makeSpatial>;
  let store: InMemoryIssueStore;
  let logger: ReturnType<typeof makeLogger>;

  const options: CollectOptions = {
    countries: ['france'],
    sources: ['*'],
    items: [7170],
    status: 'false',
    lookbackDays: 31,
  };

  beforeEach(() => {
    fetch = vi.fn<[FeedQuery], Promise<IssueDraft[]>>().mockResolvedValue([]);
    fetchDetail = vi.fn<[string, FeedStatus], Promise<IssueDetailFields | null>>().mockResolvedValue(DETAIL);
    spatial = makeSpatial();
    spatial.lookupAdministrativeUnit.mockResolvedValue(ADMIN);
    store = new InMemoryIssueStore();
    logger = makeLogger();
  });

  function collector(): IssueCollector {
    return new IssueCollector(
      { fetch, fetchDetail },
      spatial,
      store,
      makeRuntimeConfig().catalog,
      asLogger(logger),
      makePacer(),
      () => NOW,
    );
  }

  it('queries every country, distinct source, item and catalog class over the window', async () => {
    await collector().collect({ ...options, countries: ['france', 'monaco'], sources: ['12', '12', '*'] });

    expect(fetch).toHaveBeenCalledTimes(8);
    expect(fetch).toHaveBeenNthCalledWith(1, {
      country: 'france',
      source: '12',
      itemId: 7170,
      classId: 1,
      status: 'false',
      startDate: '2024-05-10',
      endDate: '2024-06-10',
    });
    expect(fetch.mock.calls.map(([query]) => `${query.country}/${query.source}/${query.classId}`)).toEqual([
      'france/12/1',
      'france/12/2',
      'france/*/1',
      'france/*/2',
      'monaco/12/1',
      'monaco/12/2',
      'monaco/*/1',
      'monaco/*/2',
    ]);
  });

  it('skips items missing from the catalog', async () => {
    await collector().collect({ ...options, items: [9999] });

    expect(fetch).not.toHaveBeenCalled();
  });

  it('deduplicates keys across queries and ignores stored issues', async () => {
    store = new InMemoryIssueStore([makeIssue('OLD')]);
    fetch.mockResolvedValueOnce([draft('A'), draft('OLD')]).mockResolvedValueOnce([draft('A'), draft('B')]);

    const summary = await collector().collect(options);

    expect(summary).toEqual({ fetched: 3, unknown: 2, inFilter: 2, persisted: 2 });
    expect(store.persisted.map((issue) => issue.key)).toEqual(['A', 'B']);
  });

  it('stores new issues enriched with detail, administrative unit and reference object', async () => {
    const reference = { id: 'REF-9', attributes: ['Isère', 'river'], modifiedAt: '2024-01-01' };
    spatial.lookupReferenceObject.mockResolvedValue(reference);
    fetch.mockResolvedValueOnce([draft('A')]);

    await collector().collect(options);

    const stored = store.current('A');
    expect(fetchDetail).toHaveBeenCalledWith('A', 'false');
    expect(spatial.lookupReferenceObject).toHaveBeenCalledWith({ lat: 45.1, lon: 5.7 }, expect.objectContaining({
      referenceTable: 'hydro.watercourse',
    }));
    expect(stored?.detail).toEqual(DETAIL);
    expect(stored?.administrative).toEqual(ADMIN);
    expect(stored?.reference).toEqual(reference);
    expect(stored?.policyExclusion).toBe('unknown');
    expect(stored?.reportLink).toBeNull();
  });

  it('keeps only issues inside the department filter', async () => {
    spatial.lookupAdministrativeUnit
      .mockResolvedValueOnce(ADMIN)
      .mockResolvedValueOnce({ ...ADMIN, departmentCode: '73' })
      .mockResolvedValueOnce(null);
    fetch.mockResolvedValueOnce([draft('A'), draft('B'), draft('C')]);

    const summary = await collector().collect({ ...options, departments: ['38'] });

    expect(summary).toEqual({ fetched: 3, unknown: 3, inFilter: 1, persisted: 1 });
    expect(store.persisted.map((issue) => issue.key)).toEqual(['A']);
    expect(spatial.lookupReferenceObject).toHaveBeenCalledTimes(1);
  });

  it('keeps only issues inside the region filter', async () => {
    spatial.lookupAdministrativeUnit
      .mockResolvedValueOnce({ ...ADMIN, regionCode: '11' })
      .mockResolvedValueOnce(ADMIN);
    fetch.mockResolvedValueOnce([draft('A'), draft('B')]);

    await collector().collect({ ...options, regions: ['84'] });

    expect(store.persisted.map((issue) => issue.key)).toEqual(['B']);
  });

  it('counts but does not store issues when the feed status is not false', async () => {
    fetch.mockResolvedValueOnce([draft('A', { status: 'open' })]);

    const summary = await collector().collect({ ...options, status: 'open' });

    expect(summary).toEqual({ fetched: 1, unknown: 1, inFilter: 0, persisted: 0 });
    expect(store.persisted).toEqual([]);
    expect(fetchDetail).not.toHaveBeenCalled();
  });

  it('propagates feed failures', async () => {
    fetch.mockRejectedValueOnce(new Error('feed unreachable'));

    await expect(collector().collect(options)).rejects.toThrow('feed unreachable');
    expect(store.persisted).toEqual([]);
  });
});
