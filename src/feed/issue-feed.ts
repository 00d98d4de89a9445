import type { FeedStatus, IssueDetailFields, IssueDraft } from '../issues/types.js';

/** One feed query: a single country, source, item and class over a date window. */
export interface FeedQuery {
  country: string;
  source: string;
  itemId: number;
  classId: number;
  status: FeedStatus;
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
}

/**
 * External catalogue of anomaly issues.
 */
export interface IssueFeed {
  fetch(query: FeedQuery): Promise<IssueDraft[]>;
  /** Detail fields for one issue, or null when the feed no longer knows it. */
  fetchDetail(key: string, status: FeedStatus): Promise<IssueDetailFields | null>;
}
