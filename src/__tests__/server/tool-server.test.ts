// ToolServer startup Test
// Test Type: Integration Test
// Startup must survive a database that cannot be opened

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { SqlConnection } from '../../database/index.js'
import { ToolServer } from '../../server/index.js'

// ============================================
// Test Configuration
// ============================================

const testConfig = {
  databaseUrl: 'not a url',
  ragApiUrl: 'http://rag.test',
  ragApiKey: 'test-key',
}

/**
 * Behaves like the postgres driver handed a malformed connection string
 */
function rejectingConnector(_connectionString: string): SqlConnection {
  throw new TypeError('Invalid URL')
}

// ============================================
// Tests
// ============================================

describe('ToolServer startup', () => {
  let server: ToolServer

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    server = new ToolServer(testConfig, { connector: rejectingConnector })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('initializes and logs when the connection string is malformed', async () => {
    await expect(server.initialize()).resolves.toBeUndefined()
    expect(console.error).toHaveBeenCalledWith('Database not reachable at startup: Invalid URL')
    expect(console.error).toHaveBeenCalledWith('ToolServer initialized')
  })

  it('reports database tools as ServiceError afterwards', async () => {
    await server.initialize()
    const result = await server.handleCallTool('query_database', { query: 'SELECT 1' })
    expect(result).toEqual({
      content: [
        { type: 'text', text: 'Error executing query_database: [ServiceError] Invalid URL' },
      ],
      isError: true,
    })
  })

  it('keeps the RAG tools working', async () => {
    await server.initialize()
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify([{ id: 'doc-1', title: 'Handbook' }]), { status: 200 })
    )
    const result = await server.handleCallTool('list_documents', {})
    expect(result.isError).toBe(false)
    expect(result.content[0].text).toBe(
      'Found 1 document(s):\n\n1. Handbook\n   ID: doc-1\n   Created: unknown\n\n'
    )
  })
})
