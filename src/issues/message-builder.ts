import type { CatalogItem, ReportingConfig } from '../config/schema.js';
import { MissingClassificationError } from '../errors.js';
import type { Issue } from './types.js';

/** Appended to the message of a report that stands for a whole cluster. */
export const CLUSTER_DISCLOSURE =
  '**Note: this report covers an area. The affected extent is shown on the attached geometry.**';

/**
 * Builds the plain-text body of a report from an enriched issue.
 */
export class MessageBuilder {
  constructor(
    private readonly catalog: Record<string, CatalogItem>,
    private readonly reporting: Pick<ReportingConfig, 'headerKeyword' | 'mapUrlTemplate'>,
  ) {}

  /**
   * Resolve the catalog entry and class title for an issue's classification.
   */
  describe(issue: Issue): { item: CatalogItem; classTitle: string } {
    const { itemId, classId } = issue.classification;
    const item = this.catalog[String(itemId)];
    const cls = item?.classes[String(classId)];
    if (!item || !cls) {
      throw new MissingClassificationError(
        `No catalog entry for item ${itemId} class ${classId}`,
        issue.key,
        itemId,
        classId,
      );
    }
    return { item, classTitle: cls.title };
  }

  build(issue: Issue): string {
    const { item, classTitle } = this.describe(issue);
    const lines: string[] = [
      this.reporting.headerKeyword,
      `Inconsistency detected on an object of type ${item.name}: ${classTitle}.`,
      `Map: ${this.mapUrl(issue)}`,
    ];

    const territory = this.territory(issue);
    if (territory) {
      lines.push(`Location: ${territory}`);
    }

    if (issue.reference) {
      const modified = issue.reference.modifiedAt ?? 'unknown';
      lines.push(`Reference object: ${issue.reference.id} (last modified ${modified})`);
      item.attributes.forEach((name, i) => {
        lines.push(`${name}: ${issue.reference?.attributes[i] ?? '-'}`);
      });
    }

    if (issue.subtitle) {
      lines.push(`Feed note: ${issue.subtitle}`);
    }

    return lines.join('\n');
  }

  /**
   * Message of a cluster report: the owner's description plus the disclosure sentence.
   */
  static forCluster(description: string): string {
    return `${description}\n${CLUSTER_DISCLOSURE}`;
  }

  private mapUrl(issue: Issue): string {
    return this.reporting.mapUrlTemplate
      .replaceAll('{lat}', String(issue.location.lat))
      .replaceAll('{lon}', String(issue.location.lon));
  }

  private territory(issue: Issue): string | null {
    const unit = issue.administrative;
    if (!unit) return null;
    return [unit.regionName, unit.departmentName, unit.municipalityName]
      .filter((part): part is string => Boolean(part))
      .join(' / ');
  }
}
