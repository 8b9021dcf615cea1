export {
  Sequencer,
  outcomeSeverity,
  runExitCode,
  summarizeRun,
  type RunOptions,
  type RunSummary,
  type SequencerConfig,
  type SequencerDependencies,
  type SequencerEvents,
} from './sequencer.js';
export {
  collectRunDiagnostics,
  type AccessPoint,
  type DiagnosticsOptions,
  type JobLogExcerpt,
  type RunDiagnostics,
} from './diagnostics.js';
export { SequenceRun, pendingGroups, type GroupResult, type SequenceRunRecord } from './sequence-run.js';
