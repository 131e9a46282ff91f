export type OperationState = "registered" | "completed" | "cancelled" | "failed";

export interface ToolOperation {
  call_id: string; // opaque, caller-supplied
  tool: string;
  arguments: string; // raw JSON as received
  state: OperationState;
  output: string | null; // present once terminal
  registered_at: number; // Unix timestamp (ms)
  finished_at: number | null;
}

export type RegisterOpts = {
  call_id: string;
  tool: string;
  arguments: string;
};
