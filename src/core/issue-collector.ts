import { format, isBefore, parseISO, subDays } from 'date-fns';
import { ConfigLoadError } from '../config/loader.js';
import type { CatalogItem, FeedConfig, RunConfig } from '../config/schema.js';
import type { FeedQuery, IssueFeed } from '../feed/issue-feed.js';
import { newIssue, type Issue, type IssueDraft } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import type { SpatialService } from '../spatial/spatial-service.js';
import type { IssueStore } from '../store/issue-store.js';
import type { Pacer } from '../util/pacer.js';

/** Feed data before this date is not considered. */
const EARLIEST_START = '2020-01-01';

export interface DateWindow {
  startDate: string;
  endDate: string;
}

export interface CollectSummary {
  fetched: number;
  unknown: number;
  inFilter: number;
  persisted: number;
}

export type CollectOptions = Pick<FeedConfig, 'countries' | 'sources' | 'items' | 'status'> &
  Pick<RunConfig, 'departments' | 'regions' | 'startDate' | 'endDate' | 'lookbackDays'>;

/**
 * Resolve the feed date window, defaulting to the last `lookbackDays` days up to today.
 */
export function resolveDateWindow(
  options: Pick<RunConfig, 'startDate' | 'endDate' | 'lookbackDays'>,
  now: Date,
): DateWindow {
  const endDate = options.endDate ?? format(now, 'yyyy-MM-dd');
  const startDate = options.startDate ?? format(subDays(parseISO(endDate), options.lookbackDays), 'yyyy-MM-dd');

  if (isBefore(parseISO(startDate), parseISO(EARLIEST_START))) {
    throw new ConfigLoadError(`Start date ${startDate} is before ${EARLIEST_START}`);
  }
  if (!isBefore(parseISO(startDate), parseISO(endDate))) {
    throw new ConfigLoadError(`Start date ${startDate} must be before end date ${endDate}`);
  }
  return { startDate, endDate };
}

/**
 * Pulls new issues from the feed, enriches them from the reference geography
 * and stores them with an unresolved policy exclusion.
 */
export class IssueCollector {
  constructor(
    private readonly feed: IssueFeed,
    private readonly spatial: SpatialService,
    private readonly store: IssueStore,
    private readonly catalog: Record<string, CatalogItem>,
    private readonly logger: Logger,
    private readonly pacer: Pacer,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async collect(options: CollectOptions): Promise<CollectSummary> {
    const window = resolveDateWindow(options, this.now());
    const drafts = await this.fetchAll(options, window);

    const fresh: IssueDraft[] = [];
    for (const draft of drafts) {
      if ((await this.store.get(draft.key)) === null) fresh.push(draft);
    }
    this.logger.info(`${drafts.length} issue(s) collected, ${fresh.length} unknown to the store`);

    const summary: CollectSummary = { fetched: drafts.length, unknown: fresh.length, inFilter: 0, persisted: 0 };

    if (options.status !== 'false') {
      this.logger.info(`Feed status is ${options.status}, nothing to persist`);
      return summary;
    }

    for (const draft of fresh) {
      const issue = await this.enrich(newIssue(draft));
      if (!this.inTerritory(issue, options)) {
        this.logger.debug('Outside the territorial filter, not stored', { issueKey: issue.key });
        continue;
      }
      summary.inFilter++;

      const item = this.catalog[String(issue.classification.itemId)];
      if (item) {
        await this.pacer.pace();
        issue.reference = await this.spatial.lookupReferenceObject(issue.location, item);
      }

      await this.store.persist(issue);
      summary.persisted++;
    }

    this.logger.info(`${summary.persisted} new issue(s) stored`);
    return summary;
  }

  /** Country × source × item × catalog class, deduplicated by key in first-seen order. */
  private async fetchAll(options: CollectOptions, window: DateWindow): Promise<IssueDraft[]> {
    const seen = new Map<string, IssueDraft>();

    for (const country of options.countries) {
      for (const source of new Set(options.sources)) {
        for (const itemId of options.items) {
          const item = this.catalog[String(itemId)];
          if (!item) continue;
          for (const classId of Object.keys(item.classes).map(Number)) {
            const query: FeedQuery = { country, source, itemId, classId, status: options.status, ...window };
            await this.pacer.pace();
            const drafts = await this.feed.fetch(query);
            this.logger.info(
              `${drafts.length} issue(s) for area ${country} source ${source} item ${itemId} class ${classId}`,
            );
            for (const draft of drafts) {
              if (!seen.has(draft.key)) seen.set(draft.key, draft);
            }
          }
        }
      }
    }

    return [...seen.values()];
  }

  private async enrich(issue: Issue): Promise<Issue> {
    if (issue.status === 'false') {
      await this.pacer.pace();
      issue.detail = await this.feed.fetchDetail(issue.key, issue.status);
    }
    await this.pacer.pace();
    issue.administrative = await this.spatial.lookupAdministrativeUnit(issue.location);
    return issue;
  }

  private inTerritory(issue: Issue, options: CollectOptions): boolean {
    const department = issue.administrative?.departmentCode ?? null;
    const region = issue.administrative?.regionCode ?? null;
    if (options.departments) {
      return department !== null && options.departments.includes(department);
    }
    if (options.regions) {
      return region !== null && options.regions.includes(region);
    }
    return true;
  }
}
