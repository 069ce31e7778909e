// MCP tool schema definitions for the tool registry

import type { Tool } from '@modelcontextprotocol/sdk/types.js'

/**
 * Names of every tool the server accepts
 */
export const TOOL_NAMES = [
  'ask_rag',
  'list_documents',
  'upload_pdf',
  'get_document',
  'query_database',
  'get_documents_from_db',
  'get_user_info',
] as const

export type ToolName = (typeof TOOL_NAMES)[number]

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((known) => known === name)
}

/**
 * All MCP tool definitions, in the order `tools/list` reports them.
 * `required` drives the MissingArgument check in the dispatcher.
 */
export const toolDefinitions: Tool[] = [
  {
    name: 'ask_rag',
    description:
      'Ask a question about documents in the RAG system. Returns AI-generated answers based on document content.',
    inputSchema: {
      type: 'object',
      properties: {
        question: {
          type: 'string',
          description: 'The question to ask about the documents (max 1000 characters)',
        },
        document_id: {
          type: 'string',
          description:
            'Optional: Specific document ID to query. Leave empty to search all documents.',
        },
      },
      required: ['question'],
    },
  },
  {
    name: 'list_documents',
    description: 'List all documents available in the RAG system with their metadata',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'upload_pdf',
    description: 'Upload a PDF file to the RAG system for processing and Q&A',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: {
          type: 'string',
          description: 'Full path to the PDF file to upload. Example: "/home/user/reports/q3.pdf"',
        },
        title: {
          type: 'string',
          description: 'Optional: Title for the document',
        },
        description: {
          type: 'string',
          description: 'Optional: Description of the document',
        },
      },
      required: ['file_path'],
    },
  },
  {
    name: 'get_document',
    description: 'Get the metadata of a single document in the RAG system by its ID',
    inputSchema: {
      type: 'object',
      properties: {
        document_id: {
          type: 'string',
          description: 'Document ID (letters, numbers, hyphens, underscores and dots)',
        },
      },
      required: ['document_id'],
    },
  },
  {
    name: 'query_database',
    description:
      'Execute a READ-ONLY SQL SELECT query on the PostgreSQL database. Only SELECT queries are allowed.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description:
            'SQL SELECT query to execute. Must start with SELECT. No DROP/DELETE/ALTER allowed.',
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_documents_from_db',
    description: 'Get a list of documents from the database with filtering options',
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'integer',
          description: 'Maximum number of documents to return (default: 10, max: 1000)',
        },
        user_id: {
          type: 'string',
          description: 'Optional: Filter by user ID',
        },
      },
    },
  },
  {
    name: 'get_user_info',
    description: 'Get information about a specific user from the database',
    inputSchema: {
      type: 'object',
      properties: {
        user_id: {
          type: 'string',
          description: 'The user ID to look up',
        },
      },
      required: ['user_id'],
    },
  },
]

/**
 * Required argument names of a tool
 */
export function requiredArguments(name: ToolName): readonly string[] {
  const definition = toolDefinitions.find((tool) => tool.name === name)
  return definition?.inputSchema.required ?? []
}
