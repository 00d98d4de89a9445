import { z } from 'zod';
import type { FeedConfig } from '../config/schema.js';
import { ContractViolationError, TransportError } from '../errors.js';
import type { FeedStatus, IssueDetailFields, IssueDraft } from '../issues/types.js';
import type { Logger } from '../logging/logger.js';
import { RetryExecutor } from '../util/retry.js';
import type { FeedQuery, IssueFeed } from './issue-feed.js';

const FeedIssueSchema = z.object({
  id: z.string().min(1),
  source: z.coerce.number().int(),
  item: z.coerce.number().int(),
  class: z.coerce.number().int(),
  level: z.coerce.number().int(),
  subtitle: z.object({ auto: z.string() }).nullable().optional(),
  update: z.string(),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
});

const FeedIssuesResponseSchema = z.object({
  issues: z.array(FeedIssueSchema),
});

const FeedDetailSchema = z.object({
  minlat: z.coerce.number(),
  maxlat: z.coerce.number(),
  minlon: z.coerce.number(),
  maxlon: z.coerce.number(),
  date: z.string(),
});

/** Failures worth another attempt: network errors, timeouts and 5xx answers. */
function isTransient(err: unknown): boolean {
  return err instanceof TransportError;
}

/**
 * Read-only client of the public issue feed (`/issues.json`, `/false-positive/{id}`, `/issue/{id}`).
 */
export class HttpIssueFeedClient implements IssueFeed {
  private readonly retry: RetryExecutor;

  constructor(
    private readonly config: Pick<
      FeedConfig,
      'endpoint' | 'useDevItem' | 'limit' | 'timeoutMs' | 'maxAttempts' | 'userAgent'
    >,
    private readonly logger: Logger,
    retry?: RetryExecutor,
  ) {
    this.retry = retry ?? new RetryExecutor(logger);
  }

  async fetch(query: FeedQuery): Promise<IssueDraft[]> {
    const params = new URLSearchParams({
      limit: String(this.config.limit),
      country: `${query.country}*`,
      full: 'true',
      status: query.status,
      start_date: query.startDate,
      end_date: query.endDate,
      useDevItem: this.config.useDevItem,
      source: query.source === '*' ? '' : query.source,
      class: String(query.classId),
      item: String(query.itemId),
    });
    const url = `${this.baseUrl()}/issues.json?${params.toString()}`;

    const body = await this.getJSON(url, `feed query item ${query.itemId} class ${query.classId}`);
    if (body === null) return [];

    const parsed = FeedIssuesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ContractViolationError(`Unexpected feed response from ${url}`, 'feed-issues', parsed.error.issues);
    }

    this.logger.debug(`Feed returned ${parsed.data.issues.length} issue(s)`, {
      data: { country: query.country, item: query.itemId, class: query.classId },
    });

    return parsed.data.issues.map((raw) => ({
      key: raw.id,
      status: query.status,
      location: { lat: raw.lat, lon: raw.lon },
      classification: { itemId: raw.item, classId: raw.class },
      source: raw.source,
      level: raw.level,
      subtitle: raw.subtitle?.auto ?? null,
      country: query.country,
      feedUpdatedAt: raw.update,
    }));
  }

  async fetchDetail(key: string, status: FeedStatus): Promise<IssueDetailFields | null> {
    const path = status === 'false' ? 'false-positive' : 'issue';
    const url = `${this.baseUrl()}/${path}/${encodeURIComponent(key)}`;

    const body = await this.getJSON(url, `feed detail ${key}`);
    if (body === null) return null;

    const parsed = FeedDetailSchema.safeParse(body);
    if (!parsed.success) {
      throw new ContractViolationError(`Unexpected feed detail for ${key}`, 'feed-detail', parsed.error.issues);
    }
    const { minlat, maxlat, minlon, maxlon, date } = parsed.data;
    return {
      bbox: { minLat: minlat, maxLat: maxlat, minLon: minlon, maxLon: maxlon },
      reportedAt: date,
    };
  }

  private baseUrl(): string {
    return this.config.endpoint.replace(/\/+$/, '');
  }

  /**
   * GET a JSON document, retrying transport failures and 5xx answers.
   * Resolves to null on 404.
   */
  private getJSON(url: string, description: string): Promise<unknown> {
    return this.retry.execute({
      description,
      maxAttempts: this.config.maxAttempts,
      isRetryable: isTransient,
      fn: async () => {
        let response: Response;
        try {
          response = await globalThis.fetch(url, {
            method: 'GET',
            headers: { Accept: 'application/json', 'User-Agent': this.config.userAgent },
            signal: AbortSignal.timeout(this.config.timeoutMs),
          });
        } catch (err) {
          throw new TransportError(`Issue feed unreachable: ${url}`, 'issue-feed', url, err);
        }

        if (response.status === 404) return null;
        if (response.status >= 500) {
          throw new TransportError(`Issue feed error: ${response.status} ${response.statusText}`, 'issue-feed', url);
        }
        if (!response.ok) {
          const text = await response.text();
          throw new ContractViolationError(
            `Issue feed rejected the request: ${response.status} ${response.statusText}`,
            'feed-request',
            { url, body: text },
          );
        }

        try {
          const json: unknown = await response.json();
          return json;
        } catch (err) {
          throw new ContractViolationError(`Issue feed answered with invalid JSON: ${url}`, 'feed-json', err);
        }
      },
    });
  }
}
