import type { UpdaterConfig } from './config';
import type { FetchLike } from './fetch/download';

// What one run of the job needs: config plus the injectable network layer
export type JobContext = UpdaterConfig & { fetch?: FetchLike };
