import type { ObjectiveStatus, Phase } from "../schemas/domain.js";

export interface Objective {
  id: string; // dot path, e.g. "contact_info.email"
  label: string;
  phase: Phase;
  status: ObjectiveStatus;
  parent_id: string | null; // derived from the path, never stored separately
  source: string; // who made the last transition ("registration", "llm", "dispatcher", ...)
  notes: string | null;
  completed_at: number | null; // Unix timestamp (ms)
  updated_at: number; // Unix timestamp (ms)
}

export type SetStatusOpts = {
  source?: string;
  notes?: string;
};
