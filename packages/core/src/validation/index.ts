export { ClusterValidator, summarizeChecks } from './cluster-validator.js';
export { buildClusterReport, collectStatus, REPORT_KINDS, STATUS_KINDS } from './cluster-report.js';
export * from './types.js';
