// =============================================================================
// Ledger Core - Public API
// =============================================================================

export { LedgerError, isLedgerError } from "./errors.js"
export {
  callSigningMessage,
  canonicalize,
  compositeKey,
  computeCanonicalHash,
  countryKey,
  isZeroAddress,
  isZeroHash,
  sha256,
  toBytes32,
} from "./hasher.js"
export {
  type CallContext,
  type EventSink,
  formatBasisPoints,
  isBasisPoints,
  paginate,
} from "./context.js"
export { type AccessRegistry, createAccessRegistry } from "./accessRegistry.js"
export { type VideoLedger, MAX_BATCH_SIZE, createVideoLedger } from "./videoLedger.js"
export { type SpreadTracker, createSpreadTracker, isViralMilestone } from "./spreadTracker.js"
export {
  type AlertEngine,
  createAlertEngine,
  firstDetectionSeverity,
  geoSpreadSeverity,
  reuploadSeverity,
} from "./alertEngine.js"
export {
  type ChainVerification,
  GENESIS_DIGEST,
  type LogEntryDraft,
  computeEntryDigest,
  sealEntry,
  verifyLogChain,
} from "./log.js"
export { type TrackingLedger, createTrackingLedger } from "./ledger.js"
