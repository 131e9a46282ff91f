export type OperationErrorCode = "DUPLICATE_OPERATION"; // call_id registered twice

export class OperationError extends Error {
  readonly fatal = true;

  constructor(
    public readonly code: OperationErrorCode,
    message: string,
    public readonly call_id: string,
  ) {
    super(message);
    this.name = "OperationError";
  }
}
