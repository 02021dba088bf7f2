export {
  createStateTable,
  lookupOrCreate,
  foldObservation,
  mergeStateStats,
  mergeStateTables,
  listStateCodes
} from './state-aggregator';
export { createStateStats, updateExtrema } from './helpers';
export * from './types';
