import { vi } from 'vitest';
import type { RuntimeConfig } from '../../src/config/loader.js';
import { ClusterRelayConfigSchema, type CatalogItem } from '../../src/config/schema.js';
import {
  newIssue,
  type AdministrativeUnit,
  type GeoPoint,
  type Issue,
  type ReferenceObject,
} from '../../src/issues/types.js';
import type { ReportRequest, ReportingService } from '../../src/reporting/reporting-service.js';
import type { ClusterAssignment, ClusterInputRow, SpatialService } from '../../src/spatial/spatial-service.js';
import type { Logger } from '../../src/logging/logger.js';
import { Pacer } from '../../src/util/pacer.js';

/** Logger double whose `child()` returns itself, so calls made by any stage land on the same mocks. */
export function makeLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    event: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(logger: ReturnType<typeof makeLogger>): Logger {
  return logger as unknown as Logger;
}

/** Pacer that never waits. */
export function makePacer(): Pacer {
  return new Pacer(0, vi.fn().mockResolvedValue(undefined));
}

export const CATALOG_INPUT = {
  '7170': {
    name: 'Waterway',
    theme: 'Hydrography',
    referenceTable: 'hydro.watercourse',
    attributes: ['toponym', 'nature'],
    classes: { '1': { title: 'Missing watercourse' }, '2': { title: 'Name mismatch' } },
  },
};

export function makeConfigInput(overrides: Record<string, unknown> = {}) {
  return {
    projectName: 'test-project',
    stateDir: '/abs/state',
    feed: { countries: ['france'], items: [7170] },
    catalog: CATALOG_INPUT,
    spatial: {
      host: 'localhost',
      database: 'reference',
      user: 'reader',
      password: 'test-secret',
      tables: { municipality: 'admin.municipality', policyZone: 'admin.policy_zone' },
    },
    reporting: {
      endpoint: 'https://reports.example.test/api/reports',
      community: 1,
      login: 'relay',
      password: 'test-secret',
    },
    ...overrides,
  };
}

export function makeRuntimeConfig(overrides: Record<string, unknown> = {}): RuntimeConfig {
  const parsed = ClusterRelayConfigSchema.parse(makeConfigInput(overrides));
  return { ...parsed, stateDir: parsed.stateDir ?? '/abs/state' };
}

export function makeIssue(key: string, overrides: Partial<Issue> = {}): Issue {
  return {
    ...newIssue({
      key,
      status: 'false',
      location: { lat: 45.1, lon: 5.7 },
      classification: { itemId: 7170, classId: 1 },
      source: 12,
      level: 2,
      subtitle: null,
      country: 'france',
      feedUpdatedAt: '2024-03-01 10:00:00+00:00',
    }),
    policyExclusion: 'not-excluded',
    ...overrides,
  };
}

export function makeSpatial() {
  return {
    clusterize: vi.fn<[ClusterInputRow[]], Promise<ClusterAssignment[]>>().mockResolvedValue([]),
    lookupAdministrativeUnit: vi.fn<[GeoPoint], Promise<AdministrativeUnit | null>>().mockResolvedValue(null),
    lookupReferenceObject: vi.fn<[GeoPoint, CatalogItem], Promise<ReferenceObject | null>>().mockResolvedValue(null),
    checkPolicyZone: vi.fn<[GeoPoint], Promise<boolean | null>>().mockResolvedValue(false),
    close: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
  } satisfies SpatialService;
}

export function makeReporting() {
  return {
    createReport: vi.fn<[ReportRequest], Promise<number>>(),
    getStatus: vi.fn<[number], Promise<string | null>>().mockResolvedValue(null),
  } satisfies ReportingService;
}
