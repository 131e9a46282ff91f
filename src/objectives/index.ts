export type { Objective, SetStatusOpts } from "./types.js";
export { LedgerError } from "./errors.js";
export type { LedgerErrorCode } from "./errors.js";
export { ObjectiveLedger, parentOf } from "./ledger.js";
