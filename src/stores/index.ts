export { InMemoryJobStore, describeFailedChunks } from './job.store.js';
export { InMemoryProgressStore } from './progress.store.js';
