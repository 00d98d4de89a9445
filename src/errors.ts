export class TransportError extends Error {
  service: string;
  url: string;

  constructor(message: string, service: string, url: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
    this.service = service;
    this.url = url;
  }
}

export class ReportingServiceError extends Error {
  status: number;
  body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'ReportingServiceError';
    this.status = status;
    this.body = body;
  }
}

/**
 * A collaborator answered with data that breaks its documented contract.
 * Never coerced: the run aborts.
 */
export class ContractViolationError extends Error {
  contract: string;
  detail: unknown;

  constructor(message: string, contract: string, detail?: unknown) {
    super(message);
    this.name = 'ContractViolationError';
    this.contract = contract;
    this.detail = detail;
  }
}

export class ClusterOrderingError extends ContractViolationError {
  clusterKey: string;

  constructor(message: string, clusterKey: string) {
    super(message, 'cluster-ordering', { clusterKey });
    this.name = 'ClusterOrderingError';
    this.clusterKey = clusterKey;
  }
}

export class MissingClassificationError extends Error {
  issueKey: string;
  itemId: number;
  classId: number;

  constructor(message: string, issueKey: string, itemId: number, classId: number) {
    super(message);
    this.name = 'MissingClassificationError';
    this.issueKey = issueKey;
    this.itemId = itemId;
    this.classId = classId;
  }
}

export class IssueEmissionError extends Error {
  issueKey: string;
  /** Reports created earlier in the aborted emission; they stay persisted. */
  reportsCreated: number;
  linked: number;

  constructor(
    message: string,
    issueKey: string,
    cause: unknown,
    progress: { reportsCreated: number; linked: number } = { reportsCreated: 0, linked: 0 },
  ) {
    super(message, { cause });
    this.name = 'IssueEmissionError';
    this.issueKey = issueKey;
    this.reportsCreated = progress.reportsCreated;
    this.linked = progress.linked;
  }
}

export class StoreError extends Error {
  path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreError';
    this.path = path;
  }
}

/**
 * Flatten an error and its `cause` chain into printable lines.
 */
export function describeErrorChain(err: unknown): string[] {
  const lines: string[] = [];
  let current: unknown = err;
  while (current != null && lines.length < 10) {
    if (current instanceof Error) {
      lines.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(String(current));
      break;
    }
  }
  return lines;
}
