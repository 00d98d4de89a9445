import { Pool } from 'pg';
import { z } from 'zod';
import type { CatalogItem, SpatialConfig } from '../config/schema.js';
import { ContractViolationError } from '../errors.js';
import type { AdministrativeUnit, GeoPoint, ReferenceObject } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import type { ClusterAssignment, ClusterInputRow, SpatialService } from './spatial-service.js';

/** The part of a pg Pool this service uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const ClusterRowSchema = z.object({
  key: z.string(),
  cluster_key: z.string().nullable(),
  bounding_geometry: z.string().nullable(),
  center_lat: z.number().nullable(),
  center_lon: z.number().nullable(),
});

const MunicipalityRowSchema = z.object({
  code: z.string(),
  name: z.string(),
  department_code: z.string().nullable(),
  department_name: z.string().nullable(),
  region_code: z.string().nullable(),
  region_name: z.string().nullable(),
});

const ReferenceRowSchema = z.object({
  id: z.string(),
  attributes: z.array(z.string().nullable()),
  modified_at: z.string().nullable(),
});

const PolicyRowSchema = z.object({ inside: z.boolean().nullable() });

/** WGS84 point moved into the working projection; $1 = lon, $2 = lat, $3 = SRID. */
const POINT_SQL = 'ST_Transform(ST_SetSRID(ST_MakePoint($1, $2), 4326), $3::integer)';

const CLUSTER_SQL = `
WITH input AS (
  SELECT t.key, t.item_id, t.class_id, t.attr1,
         ST_Transform(ST_SetSRID(ST_MakePoint(t.lon, t.lat), 4326), $2::integer) AS geom
  FROM json_to_recordset($1::json)
    AS t(key text, lat double precision, lon double precision, item_id integer, class_id integer, attr1 text)
),
clustered AS (
  SELECT input.*,
         ST_ClusterDBSCAN(geom, eps := $3::double precision, minpoints := 2)
           OVER (PARTITION BY item_id, class_id, attr1) AS raw_cluster
  FROM input
),
keyed AS (
  SELECT clustered.*,
         CASE WHEN raw_cluster IS NULL THEN NULL
              ELSE concat_ws('_', item_id, class_id, coalesce(attr1, ''), raw_cluster)
         END AS cluster_key
  FROM clustered
),
extents AS (
  SELECT cluster_key,
         ST_Envelope(ST_Expand(ST_Collect(geom), $4::double precision)) AS extent,
         ST_Centroid(ST_Collect(geom)) AS centroid
  FROM keyed
  WHERE cluster_key IS NOT NULL
  GROUP BY cluster_key
)
SELECT k.key,
       k.cluster_key,
       ST_AsText(ST_Transform(e.extent, 4326)) AS bounding_geometry,
       ST_Y(ST_Transform(e.centroid, 4326)) AS center_lat,
       ST_X(ST_Transform(e.centroid, 4326)) AS center_lon
FROM keyed k
LEFT JOIN extents e ON e.cluster_key = k.cluster_key
ORDER BY k.cluster_key NULLS LAST, ST_Distance(k.geom, e.centroid) NULLS LAST, k.key`;

/**
 * Spatial service over a PostGIS database holding the reference geography.
 * Geometry columns are expected in the configured projection.
 */
export class PostgisSpatialService implements SpatialService {
  private readonly client: SqlClient;

  constructor(
    private readonly config: SpatialConfig,
    private readonly logger: Logger,
    client?: SqlClient,
  ) {
    this.client =
      client ??
      new Pool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl,
        statement_timeout: config.statementTimeoutMs,
      });
  }

  async clusterize(rows: ClusterInputRow[]): Promise<ClusterAssignment[]> {
    if (rows.length === 0) return [];

    const payload = rows.map((row) => ({
      key: row.key,
      lat: row.lat,
      lon: row.lon,
      item_id: row.itemId,
      class_id: row.classId,
      attr1: row.attribute1,
    }));

    const result = await this.client.query(CLUSTER_SQL, [
      JSON.stringify(payload),
      this.config.projectionSrid,
      this.config.clusterDistanceMeters,
      this.config.extentMarginMeters,
    ]);

    this.logger.debug(`Clustering returned ${result.rows.length} row(s) for ${rows.length} issue(s)`);

    return result.rows.map((raw) => {
      const row = this.parse(ClusterRowSchema, raw, 'cluster-row');
      return {
        key: row.key,
        clusterKey: row.cluster_key,
        boundingGeometry: row.bounding_geometry,
        centerLat: row.center_lat,
        centerLon: row.center_lon,
      };
    });
  }

  async lookupAdministrativeUnit(point: GeoPoint): Promise<AdministrativeUnit | null> {
    const sql = `
SELECT code, name, department_code, department_name, region_code, region_name
FROM ${this.config.tables.municipality}
WHERE ST_Intersects(geometry, ${POINT_SQL})
LIMIT 1`;
    const result = await this.client.query(sql, [point.lon, point.lat, this.config.projectionSrid]);
    const [raw] = result.rows;
    if (raw === undefined) return null;

    const row = this.parse(MunicipalityRowSchema, raw, 'municipality-row');
    return {
      municipalityCode: row.code,
      municipalityName: row.name,
      departmentCode: row.department_code,
      departmentName: row.department_name,
      regionCode: row.region_code,
      regionName: row.region_name,
    };
  }

  async lookupReferenceObject(point: GeoPoint, item: CatalogItem): Promise<ReferenceObject | null> {
    const attributes = item.attributes.map((name) => `${name}::text`).join(', ');
    const modifiedAt = item.modifiedAtColumn ? `${item.modifiedAtColumn}::text` : 'NULL::text';
    const sql = `
SELECT ${item.idColumn}::text AS id,
       ARRAY[${attributes}] AS attributes,
       ${modifiedAt} AS modified_at
FROM ${item.referenceTable}
WHERE ST_DWithin(${item.geometryColumn}, ${POINT_SQL}, $4::double precision)
ORDER BY ST_Distance(${item.geometryColumn}, ${POINT_SQL})
LIMIT 1`;
    const result = await this.client.query(sql, [
      point.lon,
      point.lat,
      this.config.projectionSrid,
      this.config.referenceSearchMeters,
    ]);
    const [raw] = result.rows;
    if (raw === undefined) return null;

    const row = this.parse(ReferenceRowSchema, raw, 'reference-row');
    return { id: row.id, attributes: row.attributes, modifiedAt: row.modified_at };
  }

  async checkPolicyZone(point: GeoPoint): Promise<boolean | null> {
    // bool_or over an empty zone table is NULL: coverage unknown.
    const sql = `
SELECT bool_or(ST_Intersects(geometry, ${POINT_SQL})) AS inside
FROM ${this.config.tables.policyZone}`;
    const result = await this.client.query(sql, [point.lon, point.lat, this.config.projectionSrid]);
    const [raw] = result.rows;
    if (raw === undefined) return null;
    return this.parse(PolicyRowSchema, raw, 'policy-row').inside;
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private parse<T>(schema: z.ZodType<T>, raw: unknown, contract: string): T {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ContractViolationError(`Spatial service returned an unexpected row`, contract, parsed.error.issues);
    }
    return parsed.data;
  }
}
