import { ContractViolationError } from '../errors.js';
import type { ReportLink } from './types.js';

export function ownerOf(reportId: number): ReportLink {
  return { kind: 'owner', reportId: Math.abs(reportId) };
}

/** Always re-applies the sign from the absolute id, so a negated input stays linked to the same report. */
export function linkedTo(reportId: number): ReportLink {
  return { kind: 'linked', reportId: Math.abs(reportId) };
}

/**
 * Signed-integer form kept in the store: owners are positive, linked members negative.
 */
export function encodeReportLink(link: ReportLink | null): number | null {
  if (link === null) return null;
  return link.kind === 'owner' ? link.reportId : -link.reportId;
}

export function decodeReportLink(ref: number | null): ReportLink | null {
  if (ref === null) return null;
  if (!Number.isSafeInteger(ref) || ref === 0) {
    throw new ContractViolationError(`Invalid stored report reference: ${ref}`, 'report-reference', { ref });
  }
  return ref > 0 ? ownerOf(ref) : linkedTo(ref);
}
