import { z } from "zod";

/**
 * Closed set of input shapes a tool may declare. Tool arguments are written
 * as zod schemas; `fromZod` lowers them into this tree and `toJsonSchema`
 * renders the tree for the LLM, so the JSON Schema the model sees and the
 * validator applied to its output cannot drift apart.
 */
export type SchemaNode =
  | { kind: "string"; description?: string; minLength?: number }
  | { kind: "number"; description?: string; minimum?: number; maximum?: number }
  | { kind: "integer"; description?: string; minimum?: number; maximum?: number }
  | { kind: "boolean"; description?: string }
  | { kind: "enum"; values: string[]; description?: string }
  | { kind: "array"; items: SchemaNode; description?: string }
  | {
      kind: "object";
      properties: Record<string, SchemaNode>;
      required: string[];
      description?: string;
    };

export type JsonSchema = {
  type?: "string" | "number" | "integer" | "boolean" | "array" | "object";
  description?: string;
  enum?: string[];
  minLength?: number;
  minimum?: number;
  maximum?: number;
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
};

function withDescription<N extends SchemaNode>(
  node: N,
  description: string | undefined,
): N {
  return description === undefined ? node : { ...node, description };
}

/**
 * Lower a zod schema into a SchemaNode. Wrappers that do not change the
 * wire shape (optional, default, effects) are unwrapped; anything outside
 * the closed set throws at tool definition time.
 */
export function fromZod(schema: z.ZodTypeAny): SchemaNode {
  const description = schema.description;

  if (schema instanceof z.ZodOptional) {
    return withDescription(fromZod(schema.unwrap()), description);
  }
  if (schema instanceof z.ZodDefault) {
    return withDescription(fromZod(schema.removeDefault()), description);
  }
  if (schema instanceof z.ZodEffects) {
    return withDescription(fromZod(schema.innerType()), description);
  }
  if (schema instanceof z.ZodString) {
    const minLength = schema.minLength;
    return withDescription(
      minLength === null ? { kind: "string" } : { kind: "string", minLength },
      description,
    );
  }
  if (schema instanceof z.ZodNumber) {
    const node: { minimum?: number; maximum?: number } = {};
    if (schema.minValue !== null) node.minimum = schema.minValue;
    if (schema.maxValue !== null) node.maximum = schema.maxValue;
    return withDescription(
      schema.isInt ? { kind: "integer", ...node } : { kind: "number", ...node },
      description,
    );
  }
  if (schema instanceof z.ZodBoolean) {
    return withDescription({ kind: "boolean" }, description);
  }
  if (schema instanceof z.ZodEnum) {
    const values: string[] = [...schema.options];
    return withDescription({ kind: "enum", values }, description);
  }
  if (schema instanceof z.ZodArray) {
    return withDescription(
      { kind: "array", items: fromZod(schema.element) },
      description,
    );
  }
  if (schema instanceof z.ZodObject) {
    const properties: Record<string, SchemaNode> = {};
    const required: string[] = [];
    const shape: z.ZodRawShape = schema.shape;
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = fromZod(value);
      if (!value.isOptional()) required.push(key);
    }
    return withDescription({ kind: "object", properties, required }, description);
  }
  throw new Error(
    `Unsupported schema type for tool input: ${schema.constructor.name}`,
  );
}

export function toJsonSchema(node: SchemaNode): JsonSchema {
  const base: JsonSchema =
    node.description === undefined ? {} : { description: node.description };

  switch (node.kind) {
    case "string":
      return node.minLength === undefined
        ? { type: "string", ...base }
        : { type: "string", ...base, minLength: node.minLength };
    case "number":
    case "integer": {
      const out: JsonSchema = { type: node.kind, ...base };
      if (node.minimum !== undefined) out.minimum = node.minimum;
      if (node.maximum !== undefined) out.maximum = node.maximum;
      return out;
    }
    case "boolean":
      return { type: "boolean", ...base };
    case "enum":
      return { type: "string", ...base, enum: [...node.values] };
    case "array":
      return { type: "array", ...base, items: toJsonSchema(node.items) };
    case "object": {
      const properties: Record<string, JsonSchema> = {};
      for (const [key, value] of Object.entries(node.properties)) {
        properties[key] = toJsonSchema(value);
      }
      return {
        type: "object",
        ...base,
        properties,
        required: [...node.required],
        additionalProperties: false,
      };
    }
  }
}
