export {
  Teardown,
  type ForceCleanupReport,
  type RemainingResources,
  type TeardownConfig,
  type TeardownDependencies,
  type TeardownEvents,
  type TeardownGroupResult,
  type TeardownReport,
} from './teardown.js';
