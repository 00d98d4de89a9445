import { join } from 'node:path';
import { z } from 'zod';
import { StoreError } from '../errors.js';
import type { Issue } from '../issues/types.js';
import { decodeReportLink, encodeReportLink } from '../issues/report-link.js';
import type { Logger } from '../logging/logger.js';
import { atomicWriteJSON, exists, readJSON } from '../util/fs.js';
import { isEligible, isUnclosed, type IssueStore } from './issue-store.js';

const GeoPointSchema = z.object({ lat: z.number(), lon: z.number() });

const StoredIssueSchema = z.object({
  key: z.string().min(1),
  status: z.enum(['false', 'open', 'done']),
  location: GeoPointSchema,
  classification: z.object({ itemId: z.number().int(), classId: z.number().int() }),
  source: z.number().int(),
  level: z.number().int(),
  subtitle: z.string().nullable(),
  country: z.string(),
  feedUpdatedAt: z.string(),
  detail: z
    .object({
      bbox: z.object({ minLat: z.number(), maxLat: z.number(), minLon: z.number(), maxLon: z.number() }),
      reportedAt: z.string(),
    })
    .nullable(),
  administrative: z
    .object({
      municipalityCode: z.string(),
      municipalityName: z.string(),
      departmentCode: z.string().nullable(),
      departmentName: z.string().nullable(),
      regionCode: z.string().nullable(),
      regionName: z.string().nullable(),
    })
    .nullable(),
  reference: z
    .object({
      id: z.string(),
      attributes: z.array(z.string().nullable()),
      modifiedAt: z.string().nullable(),
    })
    .nullable(),
  policyExclusion: z.enum(['unknown', 'excluded', 'not-excluded']),
  clusterKey: z.string().nullable(),
  sketch: z
    .object({
      name: z.string(),
      description: z.string(),
      boundingGeometry: z.string(),
      center: GeoPointSchema,
      zoom: z.number().int(),
    })
    .nullable(),
  description: z.string().nullable(),
  /** Signed report reference: positive for the owner, negative for linked members. */
  reportRef: z.number().int().nullable(),
  reportStatus: z.string().nullable(),
  statusRefreshedAt: z.string().nullable(),
});

type StoredIssue = z.infer<typeof StoredIssueSchema>;

const StoreDocumentSchema = z.object({
  version: z.literal(1),
  issues: z.array(StoredIssueSchema),
});

function toStored(issue: Issue): StoredIssue {
  const { reportLink, ...rest } = issue;
  return { ...rest, reportRef: encodeReportLink(reportLink) };
}

function fromStored(stored: StoredIssue): Issue {
  const { reportRef, ...rest } = stored;
  return { ...rest, reportLink: decodeReportLink(reportRef) };
}

/**
 * Issue store backed by one JSON document, rewritten atomically on every persist.
 */
export class JsonIssueStore implements IssueStore {
  private readonly filePath: string;
  private issues: Map<string, Issue> | null = null;
  private loading: Promise<Map<string, Issue>> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    stateDir: string,
    private readonly logger: Logger,
  ) {
    this.filePath = join(stateDir, 'issues.json');
  }

  get path(): string {
    return this.filePath;
  }

  async get(key: string): Promise<Issue | null> {
    const issues = await this.load();
    return issues.get(key) ?? null;
  }

  async list(): Promise<Issue[]> {
    const issues = await this.load();
    return [...issues.values()];
  }

  async selectEligible(): Promise<Issue[]> {
    return (await this.list()).filter(isEligible);
  }

  async selectUnclosed(statuses: readonly string[]): Promise<Issue[]> {
    return (await this.list()).filter((issue) => isUnclosed(issue, statuses));
  }

  async selectPolicyUnresolved(): Promise<Issue[]> {
    return (await this.list()).filter((issue) => issue.policyExclusion === 'unknown');
  }

  async persist(issue: Issue): Promise<void> {
    const issues = await this.load();
    const previous = issues.get(issue.key);
    if (previous?.reportLink && !issue.reportLink) {
      throw new StoreError(`Refusing to clear the report link of issue ${issue.key}`, this.filePath);
    }

    const write = async (): Promise<void> => {
      const next = new Map(issues);
      next.set(issue.key, issue);
      try {
        await atomicWriteJSON(this.filePath, { version: 1, issues: [...next.values()].map(toStored) });
      } catch (err) {
        throw new StoreError(`Failed to write issue store: ${this.filePath}`, this.filePath, err);
      }
      // The in-memory view only moves once the document is on disk.
      issues.set(issue.key, issue);
    };
    // Writes are serialized; each one runs whatever the outcome of the previous one.
    const pending = this.writeQueue.then(write, write);
    this.writeQueue = pending;
    await pending;
    this.logger.debug(`Persisted issue`, { issueKey: issue.key });
  }

  private load(): Promise<Map<string, Issue>> {
    if (this.issues) return Promise.resolve(this.issues);
    if (!this.loading) {
      this.loading = this.readDocument().then((issues) => {
        this.issues = issues;
        return issues;
      });
    }
    return this.loading;
  }

  private async readDocument(): Promise<Map<string, Issue>> {
    const issues = new Map<string, Issue>();
    if (!(await exists(this.filePath))) {
      this.logger.info(`No issue store at ${this.filePath}, starting empty`);
      return issues;
    }

    let raw: unknown;
    try {
      raw = await readJSON(this.filePath);
    } catch (err) {
      throw new StoreError(`Failed to read issue store: ${this.filePath}`, this.filePath, err);
    }

    const result = StoreDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreError(`Invalid issue store document: ${this.filePath}`, this.filePath, result.error);
    }

    for (const stored of result.data.issues) {
      issues.set(stored.key, fromStored(stored));
    }
    return issues;
  }
}
