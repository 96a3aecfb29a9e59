/**
 * Receipt Split Engine
 *
 * Turns an itemized receipt, a roster and the name of whoever paid into the
 * payments that square everyone up with the payer, reconciled to the cent.
 */

export {
  computeSplits,
  safeComputeSplits,
} from "./src/engine/computeSplits.js";
export type {
  ComputeSplitsOptions,
  EngineConfig,
  SafeComputeSplitsResult,
} from "./src/engine/computeSplits.js";

export { allocateItems } from "./src/engine/allocator.js";
export type { Allocation } from "./src/engine/allocator.js";
export { reconcileMinorUnits } from "./src/engine/reconciler.js";
export { explainShare, generateSettlements } from "./src/engine/settlements.js";
export { checkPreconditions, checkVariance, isAssigned, itemProblem } from "./src/engine/validator.js";

export {
  ALL_PARTICIPANTS,
  lineItemSchema,
  parseSession,
  safeParseSession,
  sessionSchema,
  toItemAssignment,
} from "./src/models/schema.js";
export type { SafeParseSessionResult, SessionInput } from "./src/models/schema.js";

export {
  BillSplitError,
  isBillSplitError,
} from "./src/models/errors.js";
export type { BillSplitErrorCode, BillSplitErrorDetails } from "./src/models/errors.js";

export { DEFAULT_CURRENCY, SUPPORTED_CURRENCIES } from "./src/models/types.js";
export type {
  Currency,
  ItemAssignment,
  LineItem,
  ParticipantId,
  ParticipantShare,
  PersonBalance,
  Session,
  Settlement,
  SettlementWarning,
  SplitResult,
} from "./src/models/types.js";

export {
  DEFAULT_SPLIT_CONFIG,
  loadSplitConfig,
  resolveSplitConfig,
  splitConfigSchema,
} from "./src/config/splitConfig.js";
export type { SplitConfig } from "./src/config/splitConfig.js";

export { defaultLogger } from "./src/utils/logger.js";
export type { SplitLogger } from "./src/utils/logger.js";

export { calculateBalances } from "./src/utils/balances.js";
export {
  formatMoney,
  fromMinorUnits,
  getCurrency,
  minorUnitFactor,
  parseAmount,
  parseMoney,
  toMinorUnits,
} from "./src/utils/money.js";
export {
  calculatedTotal,
  describeWarning,
  hasTotalDiscrepancy,
  pricePerPerson,
  summarizeSettlement,
  totalDiscrepancy,
  unassignedItemCount,
  unitPrice,
  validateSession,
} from "./src/utils/session.js";
