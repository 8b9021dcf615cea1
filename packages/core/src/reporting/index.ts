export {
  formatClusterReport,
  formatForceCleanupReport,
  formatGroupResult,
  formatRemainingResources,
  formatRunDiagnostics,
  formatRunSummary,
  formatStatus,
  formatTeardownReport,
  formatValidationReport,
  hasRemainingResources,
} from './formatter.js';
