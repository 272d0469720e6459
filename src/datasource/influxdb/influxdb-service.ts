/**
 * InfluxDB 1.x temperature source
 *
 * Talks to the HTTP /query endpoint directly and asks for the last point of
 * a measurement field.
 */

import type { MeasurementConfig } from '$types/config';
import type { TemperatureSource } from '../types';
import type { InfluxDBServiceOptions, InfluxQueryResponse } from './types';
import { InfluxQueryResponseSchema } from './types';
import { buildLastValueQuery, buildQueryUrl, findResponseError, extractFirstValue } from './helpers';
import { DataSourceError, errorMessage } from '$types/errors';
import { fetchWithTimeout, readBodySafely } from '@utils/http';
import { isFiniteNumber } from '@utils/number';

/**
 * Create an InfluxDB-backed temperature source
 *
 * @example
 * ```typescript
 * const source = createInfluxDBService({
 *   host: 'localhost', port: 8086, database: 'home',
 *   timeoutMs: 10000, fetchFn: fetch, logger: logger
 * });
 * const indoor = await source.getLastValue({ name: 'living_room', field: 'temperature' });
 * ```
 */
export function createInfluxDBService(options: InfluxDBServiceOptions): TemperatureSource {
  const logger = options.logger;

  async function query(measurement: MeasurementConfig): Promise<InfluxQueryResponse> {
    const url = buildQueryUrl(options.host, options.port, options.database, buildLastValueQuery(measurement));
    const prefix = "Failed to query InfluxDB for measurement '" + measurement.name + "': ";
    logger.debug('InfluxDB query: ' + url);

    let response: Response;
    try {
      response = await fetchWithTimeout(options.fetchFn, url, { method: 'GET' }, options.timeoutMs);
    } catch (err) {
      throw new DataSourceError(prefix + errorMessage(err), { cause: err });
    }

    const text = await readBodySafely(response);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      const detail = response.ok ? 'invalid JSON response' : 'HTTP ' + response.status + ' ' + text;
      throw new DataSourceError(prefix + detail, { cause: err });
    }

    const parsed = InfluxQueryResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataSourceError(prefix + 'unexpected response shape');
    }

    const reported = findResponseError(parsed.data);
    if (reported !== null) {
      throw new DataSourceError(prefix + reported);
    }
    if (!response.ok) {
      throw new DataSourceError(prefix + 'HTTP ' + response.status);
    }

    return parsed.data;
  }

  async function getLastValue(measurement: MeasurementConfig): Promise<number | null> {
    const value = extractFirstValue(await query(measurement));

    if (value === undefined || value === null) {
      logger.warning(
        "No data found for measurement '" + measurement.name + "' in field '" + measurement.field + "'."
      );
      return null;
    }
    if (!isFiniteNumber(value)) {
      throw new DataSourceError(
        "Failed to query InfluxDB for measurement '" + measurement.name + "': non-numeric value " + JSON.stringify(value)
      );
    }

    return value;
  }

  return {
    getLastValue: getLastValue
  };
}
