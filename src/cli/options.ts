import { InvalidArgumentError } from 'commander';
import { REPORT_MODES, type ReportMode } from '../issues/types.js';

function isReportMode(value: string): value is ReportMode {
  return REPORT_MODES.some((mode) => mode === value);
}

export function parseMode(value: string): ReportMode {
  if (!isReportMode(value)) {
    throw new InvalidArgumentError(`Expected one of: ${REPORT_MODES.join(', ')}.`);
  }
  return value;
}

/** Variadic integer option: commander hands values over one at a time. */
export function collectItem(value: string, previous: number[] = []): number[] {
  const item = Number(value);
  if (!Number.isInteger(item) || item <= 0) {
    throw new InvalidArgumentError(`Not an item id: ${value}.`);
  }
  return [...previous, item];
}

export function parseDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return value;
}
