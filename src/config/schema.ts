import { z } from 'zod';
import { REPORT_MODES } from '../issues/types.js';

/** SQL identifier, optionally schema-qualified. Interpolated into queries, so kept strict. */
const SqlIdentifierSchema = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/, 'must be a lower-case SQL identifier');

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD');

const CatalogClassSchema = z.object({
  /** Human-readable title used in report messages. */
  title: z.string().min(1),
});

const CatalogItemSchema = z.object({
  /** Human-readable name of the anomaly kind. */
  name: z.string().min(1),
  /** Reporting-service theme reports for this item are filed under. */
  theme: z.string().min(1),
  /** Reference-geography table holding the objects this item is compared against. */
  referenceTable: SqlIdentifierSchema,
  idColumn: SqlIdentifierSchema.default('id'),
  geometryColumn: SqlIdentifierSchema.default('geometry'),
  /** Last-modification date column, when the reference table carries one. */
  modifiedAtColumn: SqlIdentifierSchema.optional(),
  /** Reference attributes to capture; the first one partitions clusters. */
  attributes: z.array(SqlIdentifierSchema).min(1).max(5),
  /** Classes of this item, keyed by class id. */
  classes: z.record(z.string().regex(/^\d+$/), CatalogClassSchema),
});

export type CatalogItem = z.infer<typeof CatalogItemSchema>;

const FeedConfigSchema = z.object({
  endpoint: z.string().url().default('https://osmose.openstreetmap.fr/api/0.3'),
  /** Feed areas to query; a trailing wildcard is appended by the client. */
  countries: z.array(z.string().min(1)).min(1),
  /** Source ids, comma-separated lists of ids, or "*". */
  sources: z.array(z.string().regex(/^\*$|^\d+(,\d+)*$/)).default(['*']),
  /** Item ids to collect; each must appear in the catalog. */
  items: z.array(z.number().int().positive()).min(1),
  status: z.enum(['false', 'open', 'done']).default('false'),
  useDevItem: z.enum(['false', 'true', 'all']).default('false'),
  limit: z.number().int().min(1).max(10_000).default(10_000),
  timeoutMs: z.number().int().positive().default(3_000),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  userAgent: z.string().default('cluster-relay/0.1'),
});

const SpatialConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().default(5432),
  database: z.string().min(1),
  user: z.string().min(1),
  /** Supports ${ENV_VAR} syntax. */
  password: z.string(),
  ssl: z.boolean().default(false),
  /** Metric projection used for distance computations. */
  projectionSrid: z.number().int().positive().default(2154),
  /** Maximum distance between two neighbours of a cluster. */
  clusterDistanceMeters: z.number().positive().default(1_000),
  /** Margin added around a cluster's extent so that aligned points still yield a polygon. */
  extentMarginMeters: z.number().min(0).default(10),
  /** Search radius around an issue when matching its reference object. */
  referenceSearchMeters: z.number().positive().default(15),
  statementTimeoutMs: z.number().int().positive().default(30_000),
  tables: z.object({
    municipality: SqlIdentifierSchema,
    policyZone: SqlIdentifierSchema,
  }),
});

const ReportingConfigSchema = z.object({
  endpoint: z.string().url(),
  /** Community (group) reports are posted to. */
  community: z.number().int().positive(),
  /** Supports ${ENV_VAR} syntax. */
  login: z.string().min(1),
  /** Supports ${ENV_VAR} syntax. */
  password: z.string().min(1),
  timeoutMs: z.number().int().positive().default(10_000),
  /** First line of every report message. */
  headerKeyword: z.string().min(1).default('CLUSTER_RELAY'),
  /** Map link added to messages. Supports {lat} and {lon} placeholders. */
  mapUrlTemplate: z.string().default('https://www.geoportail.gouv.fr/carte?c={lon},{lat}&z=17&permalink=yes'),
});

const RunConfigSchema = z
  .object({
    mode: z.enum(REPORT_MODES).default('skip'),
    /** Minimum delay between two calls to an external service. */
    callDelayMs: z.number().int().min(0).default(1_000),
    refreshConcurrency: z.number().int().min(1).max(8).default(1),
    /** Report statuses that are still refreshed. Anything else counts as closed. */
    unclosedStatuses: z
      .array(z.string().min(1))
      .default(['dry-run', 'submit', 'resubmit-unreported', 'test', 'pending', 'pending0', 'pending1', 'pending2']),
    /** Keep only issues in these department codes. */
    departments: z.array(z.string().min(1)).optional(),
    /** Keep only issues in these region codes. */
    regions: z.array(z.string().min(1)).optional(),
    startDate: IsoDateSchema.optional(),
    endDate: IsoDateSchema.optional(),
    /** Window used when startDate is absent. */
    lookbackDays: z.number().int().positive().default(31),
  })
  .refine((run) => !(run.departments && run.regions), {
    message: 'departments and regions filters are mutually exclusive',
    path: ['regions'],
  });

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  console: z.boolean().default(true),
});

export const ClusterRelayConfigSchema = z.object({
  /** Human-readable project name, used for directory naming. */
  projectName: z.string().min(1).regex(/^[a-z0-9-]+$/),

  /** Where the issue store and logs live. Defaults to `~/.cluster-relay/<projectName>`. */
  stateDir: z.string().optional(),

  feed: FeedConfigSchema,

  /** Anomaly kinds handled, keyed by item id. */
  catalog: z.record(z.string().regex(/^\d+$/), CatalogItemSchema),

  spatial: SpatialConfigSchema,

  reporting: ReportingConfigSchema,

  run: RunConfigSchema.default({}),

  logging: LoggingConfigSchema.default({}),
});

export type ClusterRelayConfig = z.infer<typeof ClusterRelayConfigSchema>;
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type SpatialConfig = z.infer<typeof SpatialConfigSchema>;
export type ReportingConfig = z.infer<typeof ReportingConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
