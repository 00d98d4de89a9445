import type { GeoPoint, Sketch } from '../issues/types.js';

/** Status sent to the reporting service: `test` reports are never forwarded to field teams. */
export type RemoteReportStatus = 'test' | 'submit';

export interface ReportRequest {
  location: GeoPoint;
  message: string;
  /** Reporting-service theme the report is filed under. */
  theme: string;
  status: RemoteReportStatus;
  sketch: Sketch | null;
}

/**
 * Remote service that creates reports and tracks their status.
 */
export interface ReportingService {
  /** Resolves to the id of the created report. */
  createReport(request: ReportRequest): Promise<number>;
  /** Current status of a report, or null when it cannot be retrieved. */
  getStatus(reportId: number): Promise<string | null>;
}
