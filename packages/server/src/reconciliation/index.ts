export {
  ReconciliationSupervisor,
  LEGACY_REJECTED_MESSAGE,
  type ReconciliationJob,
} from './supervisor.js';
