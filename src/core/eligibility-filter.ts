import type { Issue } from '../issues/types.js';
import type { IssueStore } from '../store/issue-store.js';

/**
 * Issues ready to be reported: no report link yet and a policy exclusion
 * resolved to `not-excluded`. Store order is kept.
 */
export function selectEligible(store: IssueStore): Promise<Issue[]> {
  return store.selectEligible();
}
