export * from './contracts/entities.js';
export * from './contracts/crimes.js';
export * from './contracts/summaries.js';
export * from './contracts/competitions.js';
export type { TrackerStore } from './contracts/store.js';
export * from './errors.js';
