/**
 * InfluxQL helpers
 */

import type { MeasurementConfig } from '$types/config';
import type { InfluxQueryResponse } from './types';

/**
 * Quote an identifier for InfluxQL
 *
 * @example
 * quoteIdentifier('living "room"') // '"living \\"room\\""'
 */
export function quoteIdentifier(name: string): string {
  return '"' + name.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
}

/**
 * Query selecting the most recent value of a measurement field
 */
export function buildLastValueQuery(measurement: MeasurementConfig): string {
  return 'SELECT LAST(' + quoteIdentifier(measurement.field) + ') FROM ' + quoteIdentifier(measurement.name);
}

/**
 * Build the /query URL
 */
export function buildQueryUrl(host: string, port: number, database: string, query: string): string {
  const params = new URLSearchParams({ db: database, q: query });
  return 'http://' + host + ':' + port + '/query?' + params.toString();
}

/**
 * First error reported anywhere in a response, if any
 */
export function findResponseError(response: InfluxQueryResponse): string | null {
  if (response.error !== undefined) {
    return response.error;
  }
  for (const result of response.results ?? []) {
    if (result.error !== undefined) {
      return result.error;
    }
  }
  return null;
}

/**
 * Value cell of the first row of the first series
 *
 * @returns The cell, or undefined when the response holds no rows
 */
export function extractFirstValue(response: InfluxQueryResponse): unknown {
  const series = response.results?.[0]?.series?.[0];
  const row = series?.values?.[0];
  return row === undefined ? undefined : row[1];
}
