/**
 * Per-method payload schemas. Params are checked by the server's dispatcher,
 * results by the client session, so neither side trusts free-form maps.
 */

import { z } from 'zod';

const InfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

// ── Params ──────────────────────────────────────────────────────────────

export const InitializeParamsSchema = z.object({
  protocolVersion: z.string().optional(),
  clientInfo: InfoSchema.optional(),
  capabilities: z.record(z.unknown()).optional(),
}).passthrough();

export const EmptyParamsSchema = z.object({}).passthrough();

export const ListParamsSchema = z.object({
  cursor: z.string().optional(),
});

/** `uri` is optional here so a missing target answers NotFound rather than InvalidParams. */
export const ReadResourceParamsSchema = z.object({
  uri: z.string().optional(),
});

export const CallToolParamsSchema = z.object({
  name: z.string().optional(),
  arguments: z.record(z.unknown()).optional(),
});

export const GetPromptParamsSchema = z.object({
  name: z.string().optional(),
  arguments: z.record(z.string()).optional(),
});

export type InitializeParams = z.infer<typeof InitializeParamsSchema>;
export type ListParams = z.infer<typeof ListParamsSchema>;
export type ReadResourceParams = z.infer<typeof ReadResourceParamsSchema>;
export type CallToolParams = z.infer<typeof CallToolParamsSchema>;
export type GetPromptParams = z.infer<typeof GetPromptParamsSchema>;

// ── Results ─────────────────────────────────────────────────────────────

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()).default({}),
  serverInfo: InfoSchema,
});

export const ResourceSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

const ToolPropertySchema: z.ZodType<ToolPropertyShape> = z.lazy(() =>
  z.object({
    type: z.string(),
    description: z.string().optional(),
    enum: z.array(z.string()).optional(),
    default: z.unknown().optional(),
    items: ToolPropertySchema.optional(),
  }),
);

interface ToolPropertyShape {
  type: string;
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: ToolPropertyShape;
}

export const ToolSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  inputSchema: z.object({
    type: z.literal('object'),
    properties: z.record(ToolPropertySchema).optional(),
    required: z.array(z.string()).optional(),
    additionalProperties: z.boolean().optional(),
  }),
});

export const PromptSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  arguments: z.array(z.object({
    name: z.string(),
    description: z.string().optional(),
    required: z.boolean().optional(),
  })).optional(),
});

export const ResourceContentsSchema = z.object({
  uri: z.string(),
  mimeType: z.string().optional(),
  text: z.string().optional(),
  blob: z.string().optional(),
});

export const ReadResourceResultSchema = z.object({
  contents: z.array(ResourceContentsSchema),
});

const ContentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() }),
  z.object({ type: z.literal('resource'), resource: ResourceContentsSchema }),
]);

export const ToolCallResultSchema = z.object({
  content: z.array(ContentSchema),
  isError: z.boolean().optional(),
});

export const GetPromptResultSchema = z.object({
  description: z.string().optional(),
  messages: z.array(z.object({
    role: z.enum(['user', 'assistant']),
    content: ContentSchema,
  })),
});

export const ListResultSchemas = {
  resources: z.object({ resources: z.array(ResourceSchema), nextCursor: z.string().optional() }),
  tools: z.object({ tools: z.array(ToolSchema), nextCursor: z.string().optional() }),
  prompts: z.object({ prompts: z.array(PromptSchema), nextCursor: z.string().optional() }),
} as const;

/** Item types as validated off the wire, per list kind. */
export interface ListedItemMap {
  resources: z.infer<typeof ResourceSchema>;
  tools: z.infer<typeof ToolSchema>;
  prompts: z.infer<typeof PromptSchema>;
}

export type InitializeResultPayload = z.infer<typeof InitializeResultSchema>;
export type ReadResourceResultPayload = z.infer<typeof ReadResourceResultSchema>;
export type ToolCallResultPayload = z.infer<typeof ToolCallResultSchema>;
export type GetPromptResultPayload = z.infer<typeof GetPromptResultSchema>;
