import type { Issue } from '../issues/types.js';

/**
 * Durable keyed inventory of issues. Issues are never deleted.
 * Store order is insertion order.
 */
export interface IssueStore {
  get(key: string): Promise<Issue | null>;
  list(): Promise<Issue[]>;
  /** Unreported issues whose policy exclusion resolved to `not-excluded`. */
  selectEligible(): Promise<Issue[]>;
  /** Reported issues whose report status is one of `statuses`. */
  selectUnclosed(statuses: readonly string[]): Promise<Issue[]>;
  /** Issues whose policy exclusion is still `unknown`. */
  selectPolicyUnresolved(): Promise<Issue[]>;
  /** Insert or replace the issue with the same key, in one atomic write. */
  persist(issue: Issue): Promise<void>;
}

export function isEligible(issue: Issue): boolean {
  return issue.reportLink === null && issue.policyExclusion === 'not-excluded';
}

export function isUnclosed(issue: Issue, statuses: readonly string[]): boolean {
  return issue.reportLink !== null && issue.reportStatus !== null && statuses.includes(issue.reportStatus);
}
