import { BigQuery } from '@google-cloud/bigquery';
import type { AppConfig } from './config.js';
import { DataSourceError, describeError } from './errors.js';
import { rejectOnAbort } from './utils/fan-out.js';
import type { TabularRow } from './utils/rows.js';

export type QueryParams = Record<string, string | number>;

export type QueryOptions = {
  params?: QueryParams;
  signal?: AbortSignal;
  label?: string;
};

export interface QueryClient {
  query(sql: string, options?: QueryOptions): Promise<TabularRow[]>;
}

export interface QueryJobHandle {
  getQueryResults(): Promise<[TabularRow[], ...unknown[]]>;
  cancel(): Promise<unknown>;
}

export interface QueryJobFactory {
  createQueryJob(options: { query: string; params: QueryParams; location?: string }): Promise<[QueryJobHandle, ...unknown[]]>;
}

export class BigQueryClient implements QueryClient {
  constructor(
    private readonly jobs: QueryJobFactory,
    private readonly location: string | null = null
  ) {}

  async query(sql: string, options: QueryOptions = {}): Promise<TabularRow[]> {
    const { params = {}, signal, label = 'query' } = options;

    if (signal?.aborted) {
      throw new DataSourceError(`${label} cancelled before start`, { source: label, cause: signal.reason });
    }

    let job: QueryJobHandle;
    try {
      [job] = await this.jobs.createQueryJob({
        query: sql,
        params,
        ...(this.location ? { location: this.location } : {}),
      });
    } catch (error) {
      throw new DataSourceError(describeError(error), { source: label, cause: error });
    }

    const results = job.getQueryResults();
    const abort = signal
      ? rejectOnAbort(signal, () => {
          job.cancel().catch((error: unknown) => {
            console.warn(`[warehouse] could not cancel ${label} job: ${describeError(error)}`);
          });
        })
      : null;

    try {
      const [rows] = await (abort ? Promise.race([results, abort.promise]) : results);
      return rows;
    } catch (error) {
      throw new DataSourceError(describeError(error), { source: label, cause: error });
    } finally {
      abort?.release();
    }
  }
}

export function createBigQueryClient(config: AppConfig['warehouse']): BigQueryClient {
  const bigquery = new BigQuery({
    projectId: config.projectId,
    ...(config.keyFilename ? { keyFilename: config.keyFilename } : {}),
  });
  return new BigQueryClient(bigquery, config.location);
}
