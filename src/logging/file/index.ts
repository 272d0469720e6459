export { createRotatingFileSink, rollOver } from './file-sink';
export type { FileSinkFs } from './file-sink';
