export {
  processSidecar,
  runBatch,
  createRunContext,
  type BatchDependencies,
  type BatchResult,
  type FileOutcome,
  type RunContext
} from './batch.js';
export { RunLedger } from './ledger.js';
export { writeFailureReport, failureReportPath } from './report.js';
export { findSidecars } from './walk.js';
