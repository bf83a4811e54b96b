/**
 * @catalog/ledger: the Catalog state machine.
 *
 * Pure and synchronous: no I/O, no logging, no timers. The environment it
 * runs in (clock, value transfer, content managers) comes in through the
 * ExecutionHost interface.
 */

// Facade
export { Catalog, resolveConfig, type CatalogOptions, type PoolSnapshot } from "./catalog.js";

// State + host seams
export {
  createCatalogState,
  cloneState,
  restoreState,
  type AuthorInfo,
  type ContentInfo,
  type PoolState,
  type CatalogState,
  type LedgerScope,
} from "./state.js";
export {
  callFrom,
  type CallContext,
  type ContentManager,
  type ContentManagerInfo,
  type ContentRef,
  type ExecutionHost,
  type Identity,
  type Savepoint,
} from "./host.js";

// Components
export * as contentRegistry from "./content-registry.js";
export * as authorLedger from "./author-ledger.js";
export * as premiumSubscriptions from "./premium.js";
export * as accessBridge from "./access-bridge.js";
export {
  computePremiumShares,
  distributePremiumCredits,
  liquidate,
  nextDistributionTime,
  type PremiumShare,
  type SharePlan,
  type DistributionResult,
  type LiquidationPayout,
  type LiquidationResult,
} from "./revenue.js";
export { receive, payOut } from "./treasury.js";
export { whileOpen, onlyOwner, exactValue, noValue, nonNegativeInteger } from "./guards.js";

// Errors + events
export {
  CatalogError,
  CATALOG_ERROR_CODES,
  isCatalogError,
  externalFailure,
  type CatalogErrorCode,
} from "./errors.js";
export type { CatalogEvent, CatalogEventType, CatalogEventListener } from "./events.js";

// Primitives
export { canonicalEncode, canonicalDecode } from "./canonical.js";
export {
  fingerprintOf,
  digestObject,
  isHex32,
  fromHex,
  toHex,
  type Fingerprint,
} from "./fingerprint.js";
export { generateKeypair, publicKeyFromSeed, ed25519Sign, ed25519Verify } from "./ed25519.js";
export {
  callSigningPayload,
  computeCallId,
  signCall,
  verifyCall,
  type UnsignedCall,
} from "./call-signature.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
