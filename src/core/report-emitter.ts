import { ContractViolationError, IssueEmissionError } from '../errors.js';
import { MessageBuilder } from '../issues/message-builder.js';
import { linkedTo, ownerOf } from '../issues/report-link.js';
import type { Issue, ReportLink, ReportMode } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import type { RemoteReportStatus, ReportingService } from '../reporting/reporting-service.js';
import type { IssueStore } from '../store/issue-store.js';
import type { Pacer } from '../util/pacer.js';

/** Modes that actually emit reports. */
export type EmittingMode = Exclude<ReportMode, 'skip'>;

/**
 * Fold state: the cluster currently being emitted and the report its owner created.
 */
type EmissionAccumulator =
  | { clusterKey: null }
  | { clusterKey: string; ownerReportId: number };

export interface EmissionSummary {
  reportsCreated: number;
  linked: number;
}

export function remoteStatusFor(mode: EmittingMode): RemoteReportStatus {
  return mode === 'dry-run' ? 'test' : 'submit';
}

function isValidReportId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0;
}

/**
 * Emits reports for a cluster-ordered sequence of eligible issues: one report
 * per standalone issue and per cluster; further cluster members are linked to
 * the report their cluster's first member created.
 */
export class ReportEmitter {
  constructor(
    private readonly store: IssueStore,
    private readonly reporting: ReportingService,
    private readonly messages: MessageBuilder,
    private readonly logger: Logger,
    private readonly pacer: Pacer,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async emit(sequence: Issue[], mode: ReportMode): Promise<EmissionSummary> {
    const summary: EmissionSummary = { reportsCreated: 0, linked: 0 };
    if (mode === 'skip') {
      this.logger.info(`Report mode is skip, ${sequence.length} eligible issue(s) left unreported`);
      return summary;
    }

    const stamp = this.now().toISOString();
    let acc: EmissionAccumulator = { clusterKey: null };

    for (const issue of sequence) {
      try {
        acc = await this.step(acc, issue, mode, stamp, summary);
      } catch (err) {
        this.logger.error(`Emission failed, aborting: ${err instanceof Error ? err.message : String(err)}`, {
          issueKey: issue.key,
          clusterKey: issue.clusterKey ?? undefined,
        });
        throw new IssueEmissionError(`Failed to emit report for issue ${issue.key}`, issue.key, err, { ...summary });
      }
    }

    return summary;
  }

  private async step(
    acc: EmissionAccumulator,
    issue: Issue,
    mode: EmittingMode,
    stamp: string,
    summary: EmissionSummary,
  ): Promise<EmissionAccumulator> {
    const description = this.messages.build(issue);

    if (issue.clusterKey === null) {
      const reportId = await this.create(issue, description, mode);
      await this.record(issue, description, ownerOf(reportId), mode, stamp);
      summary.reportsCreated++;
      this.logger.event({ type: 'report-emitted', issueKey: issue.key, reportId, clusterKey: null });
      return { clusterKey: null };
    }

    if (acc.clusterKey === null || acc.clusterKey !== issue.clusterKey) {
      const reportId = await this.create(issue, MessageBuilder.forCluster(description), mode);
      await this.record(issue, description, ownerOf(reportId), mode, stamp);
      summary.reportsCreated++;
      this.logger.event({ type: 'report-emitted', issueKey: issue.key, reportId, clusterKey: issue.clusterKey });
      return { clusterKey: issue.clusterKey, ownerReportId: reportId };
    }

    const link = linkedTo(acc.ownerReportId);
    await this.record(issue, description, link, mode, stamp);
    summary.linked++;
    this.logger.event({
      type: 'report-linked',
      issueKey: issue.key,
      reportId: link.reportId,
      clusterKey: issue.clusterKey,
    });
    return acc;
  }

  private async create(issue: Issue, message: string, mode: EmittingMode): Promise<number> {
    const { item } = this.messages.describe(issue);
    await this.pacer.pace();
    const reportId = await this.reporting.createReport({
      location: issue.location,
      message,
      theme: item.theme,
      status: remoteStatusFor(mode),
      sketch: issue.clusterKey === null ? null : issue.sketch,
    });
    if (!isValidReportId(reportId)) {
      throw new ContractViolationError(`Reporting service returned invalid report id ${reportId}`, 'report-id', {
        reportId,
      });
    }
    return reportId;
  }

  private record(
    issue: Issue,
    description: string,
    link: ReportLink,
    mode: EmittingMode,
    stamp: string,
  ): Promise<void> {
    return this.store.persist({
      ...issue,
      description,
      reportLink: link,
      reportStatus: link.kind === 'owner' ? mode : null,
      statusRefreshedAt: stamp,
    });
  }
}
