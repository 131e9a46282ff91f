import { monotonicFactory } from "ulid";
import { z } from "zod";
import { ArtifactError } from "../artifacts/errors.js";
import { pageArtifact } from "../artifacts/paging.js";
import type { Artifact } from "../artifacts/types.js";
import { LedgerError } from "../objectives/errors.js";
import { renderArtifactList } from "../renderers/artifact-list.js";
import { ArtifactSourceTypeSchema, ObjectiveStatusSchema } from "../schemas/domain.js";
import { TaskAssignmentSchema } from "../schemas/session-snapshot.js";
import { ToolRegistry, defineTool } from "../tools/define.js";
import { ToolError } from "../tools/errors.js";
import type { ConversationHost, PrimaryToolContext } from "./types.js";

const nextId = monotonicFactory();

const Paging = {
  limit: z.number().int().min(1).max(200).default(50).describe("Page size"),
  offset: z.number().int().min(0).default(0).describe("Items to skip"),
};

async function sessionArtifact(host: ConversationHost, artifact_id: string): Promise<Artifact> {
  const artifact = await host.store.get(artifact_id);
  if (!artifact || artifact.session_id !== host.session_id) {
    throw new ArtifactError("NOT_FOUND", `Artifact not found in this session: ${artifact_id}`);
  }
  return artifact;
}

function requireObjective(host: ConversationHost, objective_id: string | undefined): string | null {
  if (objective_id === undefined) return null;
  if (!host.ledger.has(objective_id)) {
    throw new LedgerError("UNKNOWN_OBJECTIVE", `Unknown objective: ${objective_id}`, objective_id);
  }
  return objective_id;
}

function requireIdle(host: ConversationHost): void {
  const pending = host.continuation();
  if (pending) {
    throw new ToolError("CONFLICT", `Already waiting for ${pending.kind}`);
  }
}

const listArtifacts = defineTool<
  PrimaryToolContext,
  { source_type?: z.infer<typeof ArtifactSourceTypeSchema>; limit: number; offset: number }
>({
  name: "list_artifacts",
  description: "List the artifacts attached to this interview, with their summaries.",
  args: z.object({
    source_type: ArtifactSourceTypeSchema.optional().describe("Only artifacts of this type"),
    ...Paging,
  }),
  async run(args, { host }) {
    const { items, pagination } = await host.store.list({
      session_id: host.session_id,
      source_type: args.source_type,
      limit: args.limit,
      offset: args.offset,
    });
    return {
      listing: renderArtifactList(items),
      artifact_ids: items.map((item) => item.id),
      has_more: pagination.has_more,
    };
  },
});

const getArtifact = defineTool<PrimaryToolContext, { artifact_id: string; page: number }>({
  name: "get_artifact",
  description: "Read the full text of an artifact in this interview, one page at a time.",
  args: z.object({
    artifact_id: z.string().min(1),
    page: z.number().int().min(1).default(1).describe("1-based page number"),
  }),
  async run(args, { host }) {
    const artifact = await sessionArtifact(host, args.artifact_id);
    return {
      ...pageArtifact(artifact, args.page, host.config.artifactPageChars),
      summary: artifact.summary,
    };
  },
});

const setObjectiveStatus = defineTool<
  PrimaryToolContext,
  { objective_id: string; status: z.infer<typeof ObjectiveStatusSchema>; notes?: string }
>({
  name: "set_objective_status",
  description: "Record progress on an interview objective.",
  args: z.object({
    objective_id: z.string().min(1),
    status: ObjectiveStatusSchema,
    notes: z.string().optional(),
  }),
  async run(args, { host }) {
    const previous = host.ledger.setStatus(args.objective_id, args.status, {
      source: "llm",
      notes: args.notes,
    });
    return { objective_id: args.objective_id, previous, status: args.status };
  },
});

const NoArgs = z.object({});

const nextPhaseTool = defineTool<PrimaryToolContext, z.infer<typeof NoArgs>>({
  name: "next_phase",
  description:
    "Move the interview to its next phase. Refused while required objectives are still open.",
  args: NoArgs,
  async run(_args, { host }) {
    return host.coordinator.advance();
  },
});

const getUserUpload = defineTool<
  PrimaryToolContext,
  {
    title: string;
    instructions?: string;
    source_type: z.infer<typeof ArtifactSourceTypeSchema>;
    objective_id?: string;
  }
>({
  name: "get_user_upload",
  description: "Ask the user to upload a document. The conversation pauses until they do.",
  args: z.object({
    title: z.string().min(1).describe("What to ask for, shown to the user"),
    instructions: z.string().optional(),
    source_type: ArtifactSourceTypeSchema.default("document"),
    objective_id: z.string().optional().describe("Objective the upload serves"),
  }),
  async run(args, { host }) {
    requireIdle(host);
    const objective_id = requireObjective(host, args.objective_id);
    const upload_id = nextId();
    host.enterWaiting({
      kind: "upload",
      upload_id,
      title: args.title,
      source_type: args.source_type,
      objective_id,
    });
    if (objective_id && host.ledger.get(objective_id)?.status === "not_started") {
      host.ledger.setStatus(objective_id, "in_progress", { source: "upload" });
    }
    return {
      status: "waiting_for_upload",
      upload_id,
      title: args.title,
      instructions: args.instructions ?? null,
    };
  },
});

const cancelUserUpload = defineTool<PrimaryToolContext, { reason?: string }>({
  name: "cancel_user_upload",
  description: "Withdraw the pending upload request.",
  args: z.object({ reason: z.string().optional() }),
  async run(args, { host }) {
    const pending = host.continuation();
    if (pending?.kind !== "upload") {
      throw new ToolError("CONFLICT", "No upload is pending");
    }
    host.clearWaiting();
    return { cancelled: pending.upload_id, reason: args.reason ?? null };
  },
});

const submitForValidation = defineTool<
  PrimaryToolContext,
  { title: string; content: string; objective_id?: string }
>({
  name: "submit_for_validation",
  description:
    "Show the user a draft to approve, modify or reject. The conversation pauses until they decide.",
  args: z.object({
    title: z.string().min(1),
    content: z.string().min(1).describe("The draft, as markdown"),
    objective_id: z.string().optional().describe("Objective completed by an approval"),
  }),
  async run(args, { host }) {
    requireIdle(host);
    const objective_id = requireObjective(host, args.objective_id);
    const validation_id = nextId();
    host.enterWaiting({
      kind: "validation",
      validation_id,
      title: args.title,
      content: args.content,
      objective_id,
    });
    host.bus.publish({
      type: "validation-draft-updated",
      validation_id,
      draft: { title: args.title, content: args.content },
    });
    return { status: "waiting_for_validation", validation_id };
  },
});

const updateValidationDraft = defineTool<PrimaryToolContext, { content: string; title?: string }>({
  name: "update_validation_draft",
  description: "Revise the draft the user is currently reviewing.",
  args: z.object({
    content: z.string().min(1),
    title: z.string().min(1).optional(),
  }),
  async run(args, { host }) {
    const pending = host.continuation();
    if (pending?.kind !== "validation") {
      throw new ToolError("CONFLICT", "No validation is pending");
    }
    const next = { ...pending, content: args.content, title: args.title ?? pending.title };
    host.enterWaiting(next);
    host.bus.publish({
      type: "validation-draft-updated",
      validation_id: next.validation_id,
      draft: { title: next.title, content: next.content },
    });
    return { validation_id: next.validation_id, updated: true };
  },
});

const updateDossierNotes = defineTool<
  PrimaryToolContext,
  { notes: string; mode: "append" | "replace" }
>({
  name: "update_dossier_notes",
  description: "Keep free-form notes about the applicant for later phases.",
  args: z.object({
    notes: z.string(),
    mode: z.enum(["append", "replace"]).default("append"),
  }),
  async run(args, { host }) {
    const current = host.notes();
    const next =
      args.mode === "replace" || current === "" ? args.notes : `${current}\n${args.notes}`;
    host.setNotes(next);
    return { length: next.length };
  },
});

const listArchivedArtifacts = defineTool<PrimaryToolContext, { limit: number; offset: number }>({
  name: "list_archived_artifacts",
  description: "List artifacts from earlier interviews that can be attached to this one.",
  args: z.object(Paging),
  async run(args, { host }) {
    const { items, pagination } = await host.store.list({
      archived: true,
      limit: args.limit,
      offset: args.offset,
    });
    return {
      listing: renderArtifactList(items),
      artifact_ids: items.map((item) => item.id),
      has_more: pagination.has_more,
    };
  },
});

const attachArchivedArtifact = defineTool<PrimaryToolContext, { artifact_id: string }>({
  name: "attach_archived_artifact",
  description: "Attach an archived artifact to this interview.",
  args: z.object({ artifact_id: z.string().min(1) }),
  async run(args, { host }) {
    const artifact = await host.store.promote(args.artifact_id, host.session_id);
    return { artifact_id: artifact.id, filename: artifact.filename, attached: true };
  },
});

const dispatchCardAgents = defineTool<
  PrimaryToolContext,
  { tasks: z.infer<typeof TaskAssignmentSchema>[] }
>({
  name: "dispatch_card_agents",
  description:
    "Generate knowledge cards in parallel. Each task gets only the artifacts listed for it.",
  args: z.object({
    tasks: z.array(TaskAssignmentSchema).min(1).max(12),
  }),
  async run(args, { host, call_id, signal }) {
    for (const task of args.tasks) {
      for (const artifact_id of task.artifact_ids) {
        await sessionArtifact(host, artifact_id);
      }
    }
    return host.requestDispatch(call_id, args.tasks, signal);
  },
});

/** Every tool the primary conversation can be offered. The gate decides which it sees. */
export function primaryTools(): ToolRegistry<PrimaryToolContext> {
  return new ToolRegistry<PrimaryToolContext>([
    listArtifacts,
    getArtifact,
    setObjectiveStatus,
    nextPhaseTool,
    getUserUpload,
    cancelUserUpload,
    submitForValidation,
    updateValidationDraft,
    updateDossierNotes,
    listArchivedArtifacts,
    attachArchivedArtifact,
    dispatchCardAgents,
  ]);
}
