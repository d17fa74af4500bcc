export {
  ProgressStore,
  ProgressPersistenceError,
  emptySnapshot,
  discoveredIds,
  missingIds,
  restrictToDiscovered,
  type ProgressSnapshot,
} from './progress-store.js';
