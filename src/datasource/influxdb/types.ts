import { z } from 'zod';
import type { Logger } from '@logging';
import type { FetchFn } from '@utils/http';

/**
 * InfluxDB 1.x connection options
 */
export interface InfluxDBServiceOptions {
  host: string;
  port: number;
  database: string;
  /** Abort each query after this many milliseconds */
  timeoutMs: number;
  fetchFn: FetchFn;
  logger: Logger;
}

/**
 * Body of a /query response
 */
export const InfluxQueryResponseSchema = z.object({
  error: z.string().optional(),
  results: z.array(z.object({
    error: z.string().optional(),
    series: z.array(z.object({
      name: z.string().optional(),
      columns: z.array(z.string()).optional(),
      values: z.array(z.array(z.unknown())).optional()
    })).optional()
  })).optional()
});

export type InfluxQueryResponse = z.infer<typeof InfluxQueryResponseSchema>;
