import type { CatalogItem } from '../config/schema.js';
import type { AdministrativeUnit, GeoPoint, ReferenceObject } from '../issues/types.js';

/** Projection of an issue sent for clustering. */
export interface ClusterInputRow {
  key: string;
  lat: number;
  lon: number;
  itemId: number;
  classId: number;
  attribute1: string | null;
}

/**
 * One clustering result row. Rows come back ordered by cluster key, then by
 * distance to the cluster centroid, standalone rows (null cluster key) last.
 */
export interface ClusterAssignment {
  key: string;
  clusterKey: string | null;
  /** WKT polygon of the cluster extent, WGS84. */
  boundingGeometry: string | null;
  centerLat: number | null;
  centerLon: number | null;
}

/**
 * Reference-geography service: clustering, administrative units, reference
 * objects and policy zones.
 */
export interface SpatialService {
  clusterize(rows: ClusterInputRow[]): Promise<ClusterAssignment[]>;
  lookupAdministrativeUnit(point: GeoPoint): Promise<AdministrativeUnit | null>;
  lookupReferenceObject(point: GeoPoint, item: CatalogItem): Promise<ReferenceObject | null>;
  /** True inside a policy zone, false outside, null when the service cannot tell. */
  checkPolicyZone(point: GeoPoint): Promise<boolean | null>;
  close(): Promise<void>;
}
