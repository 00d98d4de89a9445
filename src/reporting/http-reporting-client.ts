import { z } from 'zod';
import type { ReportingConfig } from '../config/schema.js';
import { ContractViolationError, ReportingServiceError, TransportError } from '../errors.js';
import type { Sketch } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import type { ReportingService, ReportRequest } from './reporting-service.js';

const CreatedReportSchema = z.object({ id: z.number() });
const ReportStatusSchema = z.object({ status: z.string() });

/** Sketch as the reporting service expects it: one polygon plus a map context. */
function toWireSketch(sketch: Sketch): Record<string, unknown> {
  return {
    desc: sketch.description,
    name: sketch.name,
    objects: [{ type: 'Polygone', geometry: sketch.boundingGeometry, attributes: {} }],
    contexte: {
      lat: String(sketch.center.lat),
      lon: String(sketch.center.lon),
      zoom: String(sketch.zoom),
    },
  };
}

/**
 * Thin HTTP client of the collaborative reporting service (Basic auth).
 */
export class HttpReportingClient implements ReportingService {
  private readonly authHeader: string;

  constructor(
    private readonly config: Pick<ReportingConfig, 'endpoint' | 'community' | 'login' | 'password' | 'timeoutMs'>,
    private readonly logger: Logger,
  ) {
    this.authHeader = `Basic ${Buffer.from(`${config.login}:${config.password}`).toString('base64')}`;
  }

  async createReport(request: ReportRequest): Promise<number> {
    const body: Record<string, unknown> = {
      community: this.config.community,
      geometry: `POINT(${request.location.lon} ${request.location.lat})`,
      comment: request.message,
      status: request.status,
      input_device: 'UNKNOWN',
      device_version: '0.0',
      attributes: {
        community: this.config.community,
        theme: request.theme,
        attributes: {},
      },
    };
    if (request.sketch) {
      body.sketch = JSON.stringify(toWireSketch(request.sketch));
    }

    const url = this.baseUrl();
    const response = await this.request(url, { method: 'POST', body: JSON.stringify(body) });
    const text = await response.text();

    if (response.status !== 201) {
      this.logger.error(`Report creation refused: ${response.status}`, { data: { body: text } });
      throw new ReportingServiceError(
        `Reporting service answered ${response.status} ${response.statusText} on creation`,
        response.status,
        text,
      );
    }

    const parsed = CreatedReportSchema.safeParse(parseJSON(text));
    if (!parsed.success) {
      throw new ContractViolationError('Created report carries no numeric id', 'report-created', { body: text });
    }
    return parsed.data.id;
  }

  async getStatus(reportId: number): Promise<string | null> {
    const url = `${this.baseUrl()}/${reportId}`;
    const response = await this.request(url, { method: 'GET' });
    if (response.status !== 200) {
      this.logger.debug(`No status for report ${reportId}: ${response.status}`, { reportId });
      return null;
    }

    const parsed = ReportStatusSchema.safeParse(parseJSON(await response.text()));
    if (!parsed.success) {
      this.logger.warn(`Report ${reportId} answered without a status`, { reportId });
      return null;
    }
    return parsed.data.status;
  }

  private baseUrl(): string {
    return this.config.endpoint.replace(/\/+$/, '');
  }

  private async request(url: string, init: { method: string; body?: string }): Promise<Response> {
    try {
      return await globalThis.fetch(url, {
        method: init.method,
        headers: {
          Authorization: this.authHeader,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: init.body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Reporting service unreachable: ${url}`, 'reporting', url, err);
    }
  }
}

function parseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
