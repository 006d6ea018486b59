import { HttpService } from '@nestjs/axios';
import { Inject, Injectable } from '@nestjs/common';
import { AxiosResponse, isAxiosError } from 'axios';
import { firstValueFrom, retry, throwError, timer } from 'rxjs';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '../../../common/config/pipeline.config';
import { describeCause, FetchError } from '../../../common/errors/pipeline.errors';
import { LoggerService } from '../../../common/services/logger.service';
import { BreweryRecord, RawPage } from '../../interfaces/brewery.interface';
import { BreweryPageSchema } from '../../validators/brewery.schema';

const TRANSIENT_STATUSES = new Set([408, 429]);

/**
 * Timeouts, dropped connections, throttling and server errors are worth
 * another attempt. Any other status is the source telling us no.
 */
export function isTransientFetchError(error: unknown): boolean {
  if (!isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  if (status === undefined) {
    return true;
  }
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Brewery API Collector
 * Walks the paginated Open Brewery DB listing one page at a time
 *
 * Features:
 * - Lazy page sequence, terminated by the first empty page
 * - Optional page limit
 * - Bounded retries with exponential backoff for transient failures
 * - Response body validation
 */
@Injectable()
export class BreweryApiCollectorService {
  constructor(
    private readonly http: HttpService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext(BreweryApiCollectorService.name);
  }

  /**
   * Yield pages in order until the source returns an empty one.
   * The empty page itself is never yielded.
   */
  async *pages(): AsyncGenerator<RawPage> {
    const { maxPages } = this.config.source;

    for (let page = 1; maxPages === 0 || page <= maxPages; page++) {
      const records = await this.fetchPage(page);

      if (records.length === 0) {
        this.logger.log(`Page ${page} is empty, stopping`);
        return;
      }

      yield { page, records };
    }

    this.logger.log(`Page limit of ${maxPages} reached, stopping`);
  }

  /**
   * Drain the page sequence. A run that fetched nothing at all is a failure.
   */
  async fetchAll(): Promise<RawPage[]> {
    const pages: RawPage[] = [];
    for await (const page of this.pages()) {
      pages.push(page);
    }

    const recordCount = pages.reduce((sum, page) => sum + page.records.length, 0);
    if (recordCount === 0) {
      throw new FetchError('Source returned no records', null, 0);
    }

    this.logger.log(`Fetched ${recordCount} records across ${pages.length} pages`);
    return pages;
  }

  async fetchPage(page: number): Promise<BreweryRecord[]> {
    const startTime = Date.now();
    const { response, attempts } = await this.request(page, startTime);

    const body = BreweryPageSchema.safeParse(response.data);
    if (!body.success) {
      throw new FetchError(
        `Page ${page} is not a JSON array of brewery objects`,
        page,
        attempts,
        response.status,
        { cause: body.error },
      );
    }

    this.logger.logExternalCall(
      'brewery-api',
      'fetchPage',
      Date.now() - startTime,
      true,
      { page, attempts, records: body.data.length },
    );
    return body.data;
  }

  private async request(
    page: number,
    startTime: number,
  ): Promise<{ response: AxiosResponse<unknown>; attempts: number }> {
    const { baseUrl, pageSize, userAgent, timeoutMs, maxAttempts, retryDelayMs } =
      this.config.source;
    let attempts = 1;

    try {
      const response = await firstValueFrom(
        this.http
          .get<unknown>(baseUrl, {
            params: { page, per_page: pageSize },
            headers: { 'User-Agent': userAgent },
            timeout: timeoutMs,
          })
          .pipe(
            retry({
              count: maxAttempts - 1,
              delay: (error: unknown, retryCount: number) => {
                if (!isTransientFetchError(error)) {
                  return throwError(() => error);
                }
                const wait = retryDelayMs * 2 ** (retryCount - 1);
                this.logger.warn(
                  `Page ${page} attempt ${retryCount} failed (${describeCause(error)}), retrying in ${wait}ms`,
                );
                attempts = retryCount + 1;
                return timer(wait);
              },
            }),
          ),
      );
      return { response, attempts };
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      this.logger.logExternalCall(
        'brewery-api',
        'fetchPage',
        Date.now() - startTime,
        false,
        { page, attempts, status },
      );
      throw new FetchError(
        `Failed to fetch page ${page} after ${attempts} attempt(s): ${describeCause(error)}`,
        page,
        attempts,
        status,
        { cause: error },
      );
    }
  }
}
