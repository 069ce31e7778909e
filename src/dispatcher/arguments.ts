// Per-tool argument schemas and the parsed ToolCall union

import { z } from 'zod'
import { type Result, err, ok } from '../result.js'
import { type ToolName, requiredArguments } from './tool-definitions.js'

/** Raw arguments as received from the protocol */
export type ArgumentBag = Record<string, unknown>

// ============================================
// Schemas
// ============================================

/**
 * Shape checks only. Domain rules (SELECT-only, limits, path safety, ...)
 * are applied afterwards by the validators.
 */
export const toolArgumentSchemas = {
  ask_rag: z.object({
    question: z.string(),
    document_id: z.string().optional(),
  }),
  list_documents: z.object({}),
  upload_pdf: z.object({
    file_path: z.string(),
    title: z.string().optional(),
    description: z.string().optional(),
  }),
  get_document: z.object({
    document_id: z.string(),
  }),
  query_database: z.object({
    query: z.string(),
  }),
  get_documents_from_db: z.object({
    limit: z.number().optional(),
    user_id: z.string().optional(),
  }),
  get_user_info: z.object({
    user_id: z.union([z.string(), z.number()]).transform(String),
  }),
} satisfies Record<ToolName, z.ZodTypeAny>

type ToolArguments<K extends ToolName> = z.output<(typeof toolArgumentSchemas)[K]>

/**
 * A tool invocation whose arguments have passed the shape check
 */
export type ToolCall = { [K in ToolName]: { tool: K; args: ToolArguments<K> } }[ToolName]

// ============================================
// Parsing
// ============================================

/**
 * Drop null-valued keys so that `null` reads the same as an absent argument
 */
function compact(args: ArgumentBag): ArgumentBag {
  return Object.fromEntries(
    Object.entries(args).filter(([, value]) => value !== null && value !== undefined)
  )
}

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}

function parseWith<K extends ToolName, S extends z.ZodTypeAny>(
  tool: K,
  schema: S,
  args: ArgumentBag
): Result<{ tool: K; args: z.output<S> }> {
  const parsed = schema.safeParse(args)
  if (!parsed.success) {
    return err('InvalidInput', parsed.error.issues.map(describeIssue).join('; '))
  }
  return ok({ tool, args: parsed.data })
}

/**
 * Coerce the raw protocol value into an argument bag
 */
export function toArgumentBag(raw: unknown): Result<ArgumentBag> {
  if (raw === undefined || raw === null) {
    return ok({})
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return err('InvalidInput', 'Arguments must be an object')
  }
  return ok(compact(Object.fromEntries(Object.entries(raw))))
}

/**
 * Check required keys, then the argument shape, for a known tool
 */
export function parseToolCall(tool: ToolName, args: ArgumentBag): Result<ToolCall> {
  const missing = requiredArguments(tool).find((key) => args[key] === undefined)
  if (missing !== undefined) {
    return err('MissingArgument', `Missing required argument: ${missing}`)
  }

  switch (tool) {
    case 'ask_rag':
      return parseWith(tool, toolArgumentSchemas.ask_rag, args)
    case 'list_documents':
      return parseWith(tool, toolArgumentSchemas.list_documents, args)
    case 'upload_pdf':
      return parseWith(tool, toolArgumentSchemas.upload_pdf, args)
    case 'get_document':
      return parseWith(tool, toolArgumentSchemas.get_document, args)
    case 'query_database':
      return parseWith(tool, toolArgumentSchemas.query_database, args)
    case 'get_documents_from_db':
      return parseWith(tool, toolArgumentSchemas.get_documents_from_db, args)
    case 'get_user_info':
      return parseWith(tool, toolArgumentSchemas.get_user_info, args)
  }
}
