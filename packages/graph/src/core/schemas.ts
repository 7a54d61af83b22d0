import * as z from "zod/v4";
import { EDGE_TYPES } from "./model.js";
import type { ValidationIssue } from "./errors.js";

const IdSchema = z.string().min(1, "must be a non-empty string");
const StringListSchema = z.array(z.string()).default(() => []);
const TextSchema = z.string().default("");

export const HighlightColorSchema = z
  .number()
  .int("must be an integer")
  .nonnegative("must not be negative");

export const ClassMetadataSchema = z.object({
  functions: StringListSchema,
  attributes: StringListSchema,
  children: StringListSchema,
});

export const FunctionMetadataSchema = z.object({
  parameters: StringListSchema,
  returns: TextSchema,
  brief_summary: TextSchema,
  full_documentation: TextSchema,
});

export const FileMetadataSchema = z.object({
  classes: StringListSchema,
  functions: StringListSchema,
});

// Absent or null metadata parses as {} so every sub-field takes its default.
const orEmpty = (value: unknown): unknown => value ?? {};

export const NodeInputSchema = z.discriminatedUnion("type", [
  z.object({
    id: IdSchema,
    type: z.literal("class"),
    metadata: z.preprocess(orEmpty, ClassMetadataSchema),
    highlight: HighlightColorSchema.optional(),
  }),
  z.object({
    id: IdSchema,
    type: z.literal("function"),
    metadata: z.preprocess(orEmpty, FunctionMetadataSchema),
    highlight: HighlightColorSchema.optional(),
  }),
  z.object({
    id: IdSchema,
    type: z.literal("file"),
    metadata: z.preprocess(orEmpty, FileMetadataSchema),
    highlight: HighlightColorSchema.optional(),
  }),
]);

export const EdgeInputSchema = z.object({
  id: IdSchema.optional(),
  source: IdSchema,
  target: IdSchema,
  type: z.enum(EDGE_TYPES),
  highlight: HighlightColorSchema.optional(),
});

export const NodeBatchSchema = z.array(NodeInputSchema);
export const EdgeBatchSchema = z.array(EdgeInputSchema);

export type NodeInput = z.output<typeof NodeInputSchema>;
export type EdgeInput = z.output<typeof EdgeInputSchema>;

/**
 * On-disk document. Missing collections default to empty; unknown
 * fields anywhere in the document are dropped.
 */
export const GraphDocumentSchema = z.object({
  nodes: z.array(NodeInputSchema).default(() => []),
  edges: z.array(EdgeInputSchema.extend({ id: IdSchema })).default(() => []),
  highlightQuestions: z.record(z.string().regex(/^\d+$/), z.string()).default(() => ({})),
});

export type GraphDocumentData = z.output<typeof GraphDocumentSchema>;

/**
 * Flatten a batch parse error into one issue per failing field,
 * tagged with the item's index and id.
 */
export function toValidationIssues(error: z.ZodError, items: readonly unknown[]): ValidationIssue[] {
  return error.issues.map((issue) => {
    const [head, ...rest] = issue.path;
    const index = typeof head === "number" ? head : -1;
    return {
      index,
      id: index >= 0 ? itemId(items[index]) : undefined,
      path: rest.map(String).join("."),
      message: issue.message,
    };
  });
}

export function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) => {
      const label = issue.id !== undefined ? `#${issue.index} (${issue.id})` : `#${issue.index}`;
      return issue.path ? `${label} ${issue.path}: ${issue.message}` : `${label}: ${issue.message}`;
    })
    .join("; ");
}

function itemId(item: unknown): string | undefined {
  if (typeof item === "object" && item !== null && "id" in item && typeof item.id === "string") {
    return item.id;
  }
  return undefined;
}
