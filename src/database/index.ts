// DatabaseService: read-only access to the PostgreSQL store

import postgres from 'postgres'
import { formatErrorMessage } from '../error-utils.js'
import { type Result, err, ok, rejectionOf } from '../result.js'
import { validateLimit, validateSqlQuery } from '../validators/index.js'

// ============================================
// Type Definitions
// ============================================

/** A row keyed by column name */
export type Row = Record<string, unknown>

/** Positional parameters bound as $1, $2, ... */
export type QueryParams = Array<string | number>

/**
 * Minimal connection handle the service needs from a driver
 */
export interface SqlConnection {
  /** Run a statement with positional parameters */
  query(text: string, params: QueryParams): Promise<Row[]>
  /** Close the underlying connection */
  end(): Promise<void>
  /** True once the connection has been closed */
  readonly closed: boolean
}

/** Opens a connection for a connection string */
export type SqlConnector = (connectionString: string) => SqlConnection

/**
 * DatabaseService configuration
 */
export interface DatabaseConfig {
  /** PostgreSQL connection string; when absent every operation fails with a ServiceError */
  connectionString: string | undefined
  /** Connect timeout in seconds (default 10) */
  connectTimeout?: number
  /** Connection factory (defaults to the postgres driver) */
  connector?: SqlConnector
}

// ============================================
// postgres driver adapter
// ============================================

/**
 * Open a single-connection postgres client (`max: 1`).
 * Queries go through `unsafe()` with a parameter array, so values are bound as $n.
 */
export function createPostgresConnector(connectTimeout = 10): SqlConnector {
  return (connectionString) => {
    const sql = postgres(connectionString, {
      max: 1,
      connect_timeout: connectTimeout,
      // stdout carries the MCP protocol
      onnotice: (notice) => console.error('Database notice:', notice),
    })
    let closed = false

    return {
      async query(text, params) {
        const rows = await sql.unsafe(text, params)
        return rows.map((row) => ({ ...row }))
      },
      async end() {
        closed = true
        await sql.end({ timeout: 5 })
      },
      get closed() {
        return closed
      },
    }
  }
}

// ============================================
// DatabaseService Class
// ============================================

/**
 * Database service
 *
 * Responsibilities:
 * - Own the single connection handle (lazy reconnect when absent or closed)
 * - Run caller SELECTs after re-validating them
 * - Build the fixed document/user queries with bound parameters
 *
 * The handle is shared by every call and is not locked. Callers that need
 * strictly serialized access must serialize upstream.
 */
export class DatabaseService {
  private readonly connectionString: string | undefined
  private readonly connector: SqlConnector
  private connection: SqlConnection | null = null

  constructor(config: DatabaseConfig) {
    this.connectionString = config.connectionString
    this.connector = config.connector ?? createPostgresConnector(config.connectTimeout)
  }

  /**
   * Open the connection (replaces any previous handle)
   */
  connect(): void {
    if (!this.connectionString) {
      throw new Error('DATABASE_URL is not configured')
    }
    this.connection = this.connector(this.connectionString)
    console.error('Database connection established')
  }

  /**
   * Reconnect if the handle is absent or reports closed
   */
  ensureConnected(): SqlConnection {
    if (!this.connection || this.connection.closed) {
      this.connect()
    }
    if (!this.connection) {
      throw new Error('Database connection unavailable')
    }
    return this.connection
  }

  /**
   * Round-trip check used at startup
   */
  async ping(): Promise<Result<true>> {
    const result = await this.run('SELECT 1', [])
    return result.ok ? ok(true) : result
  }

  /**
   * Execute a caller-supplied SELECT
   */
  async executeSelect(query: string, params: QueryParams = []): Promise<Result<Row[]>> {
    const rejection = rejectionOf(validateSqlQuery(query))
    if (rejection) {
      return rejection
    }
    return await this.run(query, params)
  }

  /**
   * List documents, optionally filtered by owner
   */
  async getDocuments(limit = 10, userId?: string): Promise<Result<Row[]>> {
    const rejection = rejectionOf(validateLimit(limit))
    if (rejection) {
      return rejection
    }

    if (userId) {
      return await this.run('SELECT * FROM documents WHERE user_id = $1 LIMIT $2', [userId, limit])
    }
    return await this.run('SELECT * FROM documents LIMIT $1', [limit])
  }

  /**
   * Look up one user; `null` when no row matches
   */
  async getUser(userId: string): Promise<Result<Row | null>> {
    const result = await this.run('SELECT * FROM users WHERE id = $1', [userId])
    if (!result.ok) {
      return result
    }
    return ok(result.value[0] ?? null)
  }

  /**
   * Close the connection
   */
  async close(): Promise<void> {
    if (!this.connection) {
      return
    }
    const connection = this.connection
    this.connection = null
    await connection.end()
    console.error('Database connection closed')
  }

  private async run(query: string, params: QueryParams): Promise<Result<Row[]>> {
    try {
      const connection = this.ensureConnected()
      const rows = await connection.query(query, params)
      console.error(`Query executed: ${query.slice(0, 100)} | Rows: ${rows.length}`)
      return ok(rows)
    } catch (error) {
      const message = formatErrorMessage(error)
      console.error('Query execution failed:', message)
      return err('ServiceError', message)
    }
  }
}
