import type { Logger } from '../logging/logger.js';
import type { SpatialService } from '../spatial/spatial-service.js';
import type { IssueStore } from '../store/issue-store.js';
import type { Pacer } from '../util/pacer.js';

export interface PolicyResolutionSummary {
  pending: number;
  excluded: number;
  notExcluded: number;
}

/**
 * Settles the policy exclusion of stored issues. Issues the spatial service
 * cannot place stay `unknown` and are retried on the next run.
 */
export class PolicyZoneResolver {
  constructor(
    private readonly spatial: SpatialService,
    private readonly store: IssueStore,
    private readonly logger: Logger,
    private readonly pacer: Pacer,
  ) {}

  async resolve(): Promise<PolicyResolutionSummary> {
    const pending = await this.store.selectPolicyUnresolved();
    const summary: PolicyResolutionSummary = { pending: pending.length, excluded: 0, notExcluded: 0 };

    for (const issue of pending) {
      await this.pacer.pace();
      const inside = await this.spatial.checkPolicyZone(issue.location);
      if (inside === null) {
        this.logger.debug('Policy zone undetermined', { issueKey: issue.key });
        continue;
      }
      await this.store.persist({ ...issue, policyExclusion: inside ? 'excluded' : 'not-excluded' });
      if (inside) {
        summary.excluded++;
      } else {
        summary.notExcluded++;
      }
    }

    this.logger.info(
      `Policy zones: ${summary.excluded + summary.notExcluded} of ${pending.length} issue(s) resolved, ${summary.excluded} excluded`,
    );
    return summary;
  }
}
