/**
 * Type definitions for anomaly issues and their accumulated report state.
 */

/** Status category reported by the issue feed. */
export type FeedStatus = 'false' | 'open' | 'done';

/** Tri-state policy exclusion: unresolved issues are never eligible for reporting. */
export type PolicyExclusion = 'unknown' | 'excluded' | 'not-excluded';

/**
 * How a run treats the reporting service.
 * - `skip`: no report is emitted.
 * - `dry-run`: reports are received but not forwarded to field teams.
 * - `submit`: reports are received and forwarded.
 * - `resubmit-unreported`: recovery run; no feed collection, unreported issues are submitted.
 */
export const REPORT_MODES = ['skip', 'dry-run', 'submit', 'resubmit-unreported'] as const;

export type ReportMode = (typeof REPORT_MODES)[number];

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface Classification {
  itemId: number;
  classId: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/** Per-issue fields only the feed's detail endpoint returns. */
export interface IssueDetailFields {
  bbox: BoundingBox;
  reportedAt: string;
}

export interface AdministrativeUnit {
  municipalityCode: string;
  municipalityName: string;
  departmentCode: string | null;
  departmentName: string | null;
  regionCode: string | null;
  regionName: string | null;
}

export interface ReferenceObject {
  id: string;
  /** Positional values matching the catalog's attribute names; index 0 partitions clusters. */
  attributes: Array<string | null>;
  modifiedAt: string | null;
}

/** Visual annotation attached to a cluster report: the cluster extent. */
export interface Sketch {
  name: string;
  description: string;
  boundingGeometry: string;
  center: GeoPoint;
  zoom: number;
}

/**
 * Which report an issue is tied to. The owner triggered the report's creation and
 * carries the authoritative status; linked members only point at it.
 */
export type ReportLink =
  | { kind: 'owner'; reportId: number }
  | { kind: 'linked'; reportId: number };

/** An issue as returned by the feed, before any enrichment. */
export interface IssueDraft {
  key: string;
  status: FeedStatus;
  location: GeoPoint;
  classification: Classification;
  source: number;
  level: number;
  subtitle: string | null;
  country: string;
  feedUpdatedAt: string;
}

export interface Issue extends IssueDraft {
  detail: IssueDetailFields | null;
  administrative: AdministrativeUnit | null;
  reference: ReferenceObject | null;
  policyExclusion: PolicyExclusion;
  clusterKey: string | null;
  sketch: Sketch | null;
  description: string | null;
  reportLink: ReportLink | null;
  reportStatus: string | null;
  statusRefreshedAt: string | null;
}

export function newIssue(draft: IssueDraft): Issue {
  return {
    ...draft,
    detail: null,
    administrative: null,
    reference: null,
    policyExclusion: 'unknown',
    clusterKey: null,
    sketch: null,
    description: null,
    reportLink: null,
    reportStatus: null,
    statusRefreshedAt: null,
  };
}

/** The reference attribute the spatial service partitions clusters by. */
export function attributeOne(issue: Issue): string | null {
  return issue.reference?.attributes[0] ?? null;
}
