import { z } from 'zod';
import { ClusterOrderingError, ContractViolationError } from '../errors.js';
import type { Issue, Sketch } from '../issues/types.js';
import { attributeOne } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import type { ClusterInputRow, SpatialService } from '../spatial/spatial-service.js';

/** Map zoom of the sketch attached to cluster reports. */
export const SKETCH_ZOOM = 17;

const SKETCH_LABEL = 'Cluster extent';

const AssignmentSchema = z.union([
  z.object({
    key: z.string().min(1),
    clusterKey: z.string().min(1),
    boundingGeometry: z.string().min(1),
    centerLat: z.number(),
    centerLon: z.number(),
  }),
  z.object({
    key: z.string().min(1),
    clusterKey: z.null(),
  }),
]);

type Assignment = z.infer<typeof AssignmentSchema>;

function toInputRow(issue: Issue): ClusterInputRow {
  return {
    key: issue.key,
    lat: issue.location.lat,
    lon: issue.location.lon,
    itemId: issue.classification.itemId,
    classId: issue.classification.classId,
    attribute1: attributeOne(issue),
  };
}

function sketchOf(assignment: Assignment): Sketch | null {
  if (assignment.clusterKey === null) return null;
  return {
    name: SKETCH_LABEL,
    description: SKETCH_LABEL,
    boundingGeometry: assignment.boundingGeometry,
    center: { lat: assignment.centerLat, lon: assignment.centerLon },
    zoom: SKETCH_ZOOM,
  };
}

/**
 * Attaches the spatial service's clustering onto a batch of issues and
 * returns them in the service's order. Members of one cluster come out adjacent.
 */
export class ClusterCorrelator {
  constructor(
    private readonly spatial: SpatialService,
    private readonly logger: Logger,
  ) {}

  async correlate(issues: Issue[]): Promise<Issue[]> {
    if (issues.length === 0) return [];

    const byKey = new Map(issues.map((issue) => [issue.key, issue]));
    const rows = await this.spatial.clusterize(issues.map(toInputRow));

    const ordered: Issue[] = [];
    const attached = new Set<string>();
    const closedClusters = new Set<string>();
    let currentCluster: string | null = null;

    for (const raw of rows) {
      const parsed = AssignmentSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ContractViolationError(
          `Clustering row for ${raw.key} is incomplete`,
          'cluster-row',
          parsed.error.issues,
        );
      }
      const assignment = parsed.data;

      const issue = byKey.get(assignment.key);
      if (!issue) {
        throw new ContractViolationError(`Clustering returned unknown issue ${assignment.key}`, 'cluster-row', {
          key: assignment.key,
        });
      }
      if (attached.has(assignment.key)) {
        throw new ContractViolationError(`Clustering returned issue ${assignment.key} twice`, 'cluster-row', {
          key: assignment.key,
        });
      }

      if (assignment.clusterKey !== currentCluster) {
        if (currentCluster !== null) closedClusters.add(currentCluster);
        if (assignment.clusterKey !== null && closedClusters.has(assignment.clusterKey)) {
          throw new ClusterOrderingError(
            `Cluster ${assignment.clusterKey} reappears after a different row`,
            assignment.clusterKey,
          );
        }
        currentCluster = assignment.clusterKey;
      }

      attached.add(assignment.key);
      ordered.push({ ...issue, clusterKey: assignment.clusterKey, sketch: sketchOf(assignment) });
    }

    for (const issue of issues) {
      if (!attached.has(issue.key)) {
        this.logger.warn('Issue missing from clustering response, left out of this run', { issueKey: issue.key });
      }
    }

    const clusters = new Set(ordered.flatMap((issue) => (issue.clusterKey ? [issue.clusterKey] : [])));
    this.logger.info(`Correlated ${ordered.length} issue(s) into ${clusters.size} cluster(s)`);
    return ordered;
  }
}
