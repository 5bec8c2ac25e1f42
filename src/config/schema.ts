import { z } from 'zod';

const ServerSchema = z.object({
  name: z.string().default('mcp-stdio-engine'),
  version: z.string().default('0.1.0'),
});

const PageSizeSchema = z.number().int().min(1).max(100);

const PaginationSchema = z.object({
  resourcesPageSize: PageSizeSchema.default(25),
  toolsPageSize: PageSizeSchema.default(20),
  promptsPageSize: PageSizeSchema.default(30),
});

const TransportSchema = z.object({
  readTimeoutMs: z.number().int().positive().default(30_000),
  terminateGraceMs: z.number().int().nonnegative().default(2_000),
  startupTimeoutMs: z.number().int().positive().default(10_000),
});

const SecuritySchema = z.object({
  /** Absent = any command may be launched; [] = none may. */
  allowedCommands: z.array(z.string()).optional(),
});

const StaticResourceSchema = z.object({
  uri: z.string().min(1),
  name: z.string().min(1),
  text: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

const ResourcesSchema = z.object({
  roots: z.array(z.string()).default([]),
  maxFileSize: z.number().int().positive().default(1_048_576),
  static: z.array(StaticResourceSchema).default([]),
});

const PromptArgumentSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  required: z.boolean().default(false),
});

const PromptTemplateSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  /** When omitted, every `{placeholder}` in the template becomes a required argument. */
  arguments: z.array(PromptArgumentSchema).optional(),
  template: z.string(),
});

export type PromptTemplateConfig = z.infer<typeof PromptTemplateSchema>;

const PromptsSchema = z.object({
  templates: z.array(PromptTemplateSchema).default([]),
});

const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const McpStdioConfigSchema = z.object({
  server: ServerSchema.optional().transform(v => ServerSchema.parse(v ?? {})),
  pagination: PaginationSchema.optional().transform(v => PaginationSchema.parse(v ?? {})),
  transport: TransportSchema.optional().transform(v => TransportSchema.parse(v ?? {})),
  security: SecuritySchema.optional().transform(v => SecuritySchema.parse(v ?? {})),
  resources: ResourcesSchema.optional().transform(v => ResourcesSchema.parse(v ?? {})),
  prompts: PromptsSchema.optional().transform(v => PromptsSchema.parse(v ?? {})),
  logging: LoggingSchema.optional().transform(v => LoggingSchema.parse(v ?? {})),
});

export type McpStdioConfig = z.infer<typeof McpStdioConfigSchema>;
