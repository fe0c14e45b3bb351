export { aggregate, compareSummaryKeys, filterSuccessful, periodOf, type AggregateOptions } from './aggregation/aggregator.js';
export { summarizeControl, type ControlSummary } from './aggregation/control-summary.js';
export {
  GROUP_KEY_ORDER,
  commissionPercentage,
  matchPercentage,
  type Summary,
  type SummaryKey,
} from './aggregation/summary.js';
export {
  controlRecord,
  fixed,
  serializeSummaries,
  summaryRecord,
  verifiedTransactionRecord,
  type SummaryRecord,
  type VerifiedTransactionRecord,
} from './aggregation/summary-serializer.js';
export {
  ReconciliationPipeline,
  reconciliationOptionsFromSettings,
  type ReconciliationOptions,
  type ReconciliationResult,
} from './pipeline/reconciliation-pipeline.js';
export { DEFAULT_TOLERANCE, RateVerifier, type RateLookup, type RateVerifierOptions } from './verification/rate-verifier.js';
export type { VerificationStatus, VerifiedTransaction } from './verification/verified-transaction.js';
