export { runOccupancyJob } from './OccupancyJob.ts';
export type { OccupancyJobDeps } from './OccupancyJob.ts';
