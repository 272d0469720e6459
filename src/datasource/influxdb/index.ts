export { createInfluxDBService } from './influxdb-service';
export { buildLastValueQuery, buildQueryUrl, quoteIdentifier } from './helpers';
export type { InfluxDBServiceOptions } from './types';
