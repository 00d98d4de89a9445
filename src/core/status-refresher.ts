import pLimit from 'p-limit';
import type { Issue } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import type { ReportingService } from '../reporting/reporting-service.js';
import type { IssueStore } from '../store/issue-store.js';
import type { Pacer } from '../util/pacer.js';

export interface StatusRefreshOptions {
  /** Report statuses still worth polling. */
  unclosedStatuses: readonly string[];
  /** Maximum number of status lookups in flight. */
  concurrency: number;
}

export interface RefreshSummary {
  checked: number;
  updated: number;
  unanswered: number;
  failed: number;
}

/**
 * Polls the reporting service for every issue holding an unclosed report and
 * persists the statuses it returns. A lookup without an answer leaves the issue untouched.
 */
export class StatusRefresher {
  constructor(
    private readonly store: IssueStore,
    private readonly reporting: ReportingService,
    private readonly logger: Logger,
    private readonly pacer: Pacer,
    private readonly options: StatusRefreshOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async refresh(): Promise<RefreshSummary> {
    const issues = await this.store.selectUnclosed(this.options.unclosedStatuses);
    const stamp = this.now().toISOString();
    const summary: RefreshSummary = { checked: issues.length, updated: 0, unanswered: 0, failed: 0 };

    this.logger.info(`Refreshing status of ${issues.length} report(s)`);

    const limit = pLimit(this.options.concurrency);
    const results = await Promise.allSettled(issues.map((issue) => limit(() => this.refreshOne(issue, stamp))));

    const errors: unknown[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        summary.failed++;
        errors.push(result.reason);
        this.logger.error(`Status lookup failed: ${String(result.reason)}`, { issueKey: issues[i]?.key });
      } else if (result.value) {
        summary.updated++;
      } else {
        summary.unanswered++;
      }
    });

    if (errors.length > 0) {
      throw new AggregateError(errors, `${errors.length} of ${issues.length} status lookup(s) failed`);
    }
    return summary;
  }

  /** Resolves to true when a status was persisted. */
  private async refreshOne(issue: Issue, stamp: string): Promise<boolean> {
    if (!issue.reportLink) return false;

    // Always the owner's report id, whatever side of the link this issue is on.
    const reportId = Math.abs(issue.reportLink.reportId);
    await this.pacer.pace();
    const status = await this.reporting.getStatus(reportId);
    if (status === null) {
      this.logger.debug('No status returned, left unchanged', { issueKey: issue.key, reportId });
      return false;
    }

    await this.store.persist({ ...issue, reportStatus: status, statusRefreshedAt: stamp });
    this.logger.event({
      type: 'status-refreshed',
      issueKey: issue.key,
      reportId,
      previousStatus: issue.reportStatus,
      status,
    });
    return true;
  }
}
