import type { RuntimeConfig } from '../config/loader.js';
import { IssueEmissionError } from '../errors.js';
import { HttpIssueFeedClient } from '../feed/http-issue-feed-client.js';
import type { IssueFeed } from '../feed/issue-feed.js';
import { MessageBuilder } from '../issues/message-builder.js';
import type { Logger } from '../logging/logger.js';
import { HttpReportingClient } from '../reporting/http-reporting-client.js';
import type { ReportingService } from '../reporting/reporting-service.js';
import { PostgisSpatialService } from '../spatial/postgis-spatial-service.js';
import type { SpatialService } from '../spatial/spatial-service.js';
import type { IssueStore } from '../store/issue-store.js';
import { JsonIssueStore } from '../store/json-issue-store.js';
import { Pacer } from '../util/pacer.js';
import { ClusterCorrelator } from './cluster-correlator.js';
import { selectEligible } from './eligibility-filter.js';
import { IssueCollector, type CollectSummary } from './issue-collector.js';
import { PolicyZoneResolver, type PolicyResolutionSummary } from './policy-zone-resolver.js';
import { ReportEmitter, type EmissionSummary } from './report-emitter.js';
import { StatusRefresher, type RefreshSummary } from './status-refresher.js';

export interface RunDependencies {
  feed: IssueFeed;
  spatial: SpatialService;
  reporting: ReportingService;
  store: IssueStore;
  pacer: Pacer;
  now?: () => Date;
}

export interface RunOptions {
  /** Skip feed collection; policy resolution, emission and refresh still run. */
  statusesOnly?: boolean;
}

export interface RunSummary {
  collected: CollectSummary | null;
  policy: PolicyResolutionSummary;
  eligible: number;
  emission: EmissionSummary;
  refresh: RefreshSummary;
}

/**
 * Wire the production collaborators from a loaded config.
 */
export function createRunDependencies(config: RuntimeConfig, logger: Logger): RunDependencies {
  return {
    feed: new HttpIssueFeedClient(config.feed, logger.child('feed')),
    spatial: new PostgisSpatialService(config.spatial, logger.child('spatial')),
    reporting: new HttpReportingClient(config.reporting, logger.child('reporting')),
    store: new JsonIssueStore(config.stateDir, logger.child('store')),
    pacer: new Pacer(config.run.callDelayMs),
  };
}

/**
 * Runs one pass: collect → resolve policy zones → correlate and emit → refresh statuses.
 */
export class RunCoordinator {
  private readonly now: () => Date;

  constructor(
    private readonly config: RuntimeConfig,
    private readonly logger: Logger,
    private readonly deps: RunDependencies,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const startTime = Date.now();
    const mode = this.config.run.mode;
    const statusesOnly = options.statusesOnly ?? false;
    this.logger.event({ type: 'run-started', mode, statusesOnly });
    let eligibleCount = 0;

    try {
      let collected: CollectSummary | null = null;
      if (mode === 'resubmit-unreported') {
        this.logger.info('Recovery run: feed collection skipped');
      } else if (statusesOnly) {
        this.logger.info('Statuses only: feed collection skipped');
      } else {
        collected = await this.collector().collect({ ...this.config.feed, ...this.config.run });
      }

      const policy = await new PolicyZoneResolver(
        this.deps.spatial,
        this.deps.store,
        this.logger.child('policy'),
        this.deps.pacer,
      ).resolve();

      const eligible = await selectEligible(this.deps.store);
      eligibleCount = eligible.length;
      let emission: EmissionSummary = { reportsCreated: 0, linked: 0 };
      if (mode === 'skip') {
        this.logger.info(`Report mode is skip, ${eligible.length} eligible issue(s) left unreported`);
      } else if (eligible.length > 0) {
        const sequence = await new ClusterCorrelator(this.deps.spatial, this.logger.child('correlator')).correlate(
          eligible,
        );
        emission = await this.emitter().emit(sequence, mode);
      }
      this.logger.info(`Emitted ${emission.reportsCreated} report(s) for ${eligible.length} eligible issue(s)`);

      const refresh = await this.refresher().refresh();

      this.logger.event({
        type: 'run-completed',
        eligible: eligible.length,
        reportsEmitted: emission.reportsCreated,
        linked: emission.linked,
        refreshed: refresh.updated,
        duration: Date.now() - startTime,
      });

      return { collected, policy, eligible: eligible.length, emission, refresh };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      if (err instanceof IssueEmissionError) {
        this.logger.info(`Emitted ${err.reportsCreated} report(s) for ${eligibleCount} eligible issue(s)`);
        this.logger.event(
          {
            type: 'run-failed',
            error,
            reportsEmitted: err.reportsCreated,
            linked: err.linked,
            duration: Date.now() - startTime,
          },
          'error',
        );
      } else {
        this.logger.event({ type: 'run-failed', error, duration: Date.now() - startTime }, 'error');
      }
      throw err;
    } finally {
      await this.deps.spatial.close();
    }
  }

  /**
   * Status refresh on its own, for a cadence independent from emission runs.
   */
  async refresh(): Promise<RefreshSummary> {
    try {
      return await this.refresher().refresh();
    } finally {
      await this.deps.spatial.close();
    }
  }

  private collector(): IssueCollector {
    return new IssueCollector(
      this.deps.feed,
      this.deps.spatial,
      this.deps.store,
      this.config.catalog,
      this.logger.child('collector'),
      this.deps.pacer,
      this.now,
    );
  }

  private emitter(): ReportEmitter {
    return new ReportEmitter(
      this.deps.store,
      this.deps.reporting,
      new MessageBuilder(this.config.catalog, this.config.reporting),
      this.logger.child('emitter'),
      this.deps.pacer,
      this.now,
    );
  }

  private refresher(): StatusRefresher {
    return new StatusRefresher(
      this.deps.store,
      this.deps.reporting,
      this.logger.child('refresh'),
      this.deps.pacer,
      {
        unclosedStatuses: this.config.run.unclosedStatuses,
        concurrency: this.config.run.refreshConcurrency,
      },
      this.now,
    );
  }
}
