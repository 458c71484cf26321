/**
 * Chain module exports
 */

export {
  buildChains,
  chainTip,
  groupChains,
  oldestIncremental,
  scanBackupRoot,
} from "./builder";
export { BrokenChainError, reconstructChain } from "./reconstructor";
export { type ChainVerification, type VerifyReport, verifyBackupRoot } from "./verifier";
