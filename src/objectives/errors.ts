export type LedgerErrorCode =
  | "UNKNOWN_OBJECTIVE" // setStatus/get on an id that was never registered
  | "DUPLICATE_OBJECTIVE" // registerObjective with an id already in the ledger
  | "INVALID_OBJECTIVE_ID" // id is not a dot path of non-empty segments
  | "WRITE_OUTSIDE_DISCIPLINE"; // write issued while another write is still publishing

export class LedgerError extends Error {
  readonly fatal: boolean;

  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly objective_id?: string,
  ) {
    super(message);
    this.name = "LedgerError";
    this.fatal = code === "WRITE_OUTSIDE_DISCIPLINE";
  }
}
