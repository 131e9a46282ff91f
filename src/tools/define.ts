import type { z } from "zod";
import type { ToolDefinition } from "../llm/types.js";
import { ToolError } from "./errors.js";
import { fromZod, toJsonSchema } from "./schema.js";

/**
 * A tool with its argument type erased. `invoke` parses and validates the
 * raw JSON arguments before the handler sees them.
 */
export interface Tool<C> {
  readonly name: string;
  readonly description: string;
  readonly definition: ToolDefinition;
  invoke(rawArguments: string, ctx: C): Promise<unknown>;
}

export interface ToolSpec<C, A> {
  name: string;
  description: string;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  run(args: A, ctx: C): Promise<unknown>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function parseArguments(raw: string): unknown {
  const text = raw.trim() === "" ? "{}" : raw;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ToolError(
      "INVALID_ARGUMENTS",
      `arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function defineTool<C, A>(spec: ToolSpec<C, A>): Tool<C> {
  const node = fromZod(spec.args);
  if (node.kind !== "object") {
    throw new Error(`Tool ${spec.name}: arguments must be an object schema`);
  }
  const definition: ToolDefinition = {
    name: spec.name,
    description: spec.description,
    parameters: toJsonSchema(node),
  };

  return {
    name: spec.name,
    description: spec.description,
    definition,
    async invoke(rawArguments, ctx) {
      const parsed = spec.args.safeParse(parseArguments(rawArguments));
      if (!parsed.success) {
        throw new ToolError(
          "INVALID_ARGUMENTS",
          formatIssues(parsed.error),
          spec.name,
        );
      }
      return spec.run(parsed.data, ctx);
    },
  };
}

/** Name-indexed set of tools sharing one execution context. */
export class ToolRegistry<C> {
  private tools = new Map<string, Tool<C>>();

  constructor(tools: Tool<C>[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: Tool<C>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool<C> | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Definitions for the given names, in registry order. Unknown names are skipped. */
  definitions(names: Iterable<string>): ToolDefinition[] {
    const wanted = new Set(names);
    return [...this.tools.values()]
      .filter((tool) => wanted.has(tool.name))
      .map((tool) => tool.definition);
  }
}
