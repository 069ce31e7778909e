import { describe, expect, it } from 'vitest'
import {
  validateDocumentId,
  validateFilePath,
  validateLimit,
  validateQuestion,
  validateSqlQuery,
} from '../index.js'

describe('validateSqlQuery', () => {
  it('accepts a plain SELECT regardless of case and surrounding whitespace', () => {
    expect(validateSqlQuery('SELECT * FROM users')).toEqual({ valid: true })
    expect(validateSqlQuery('   select id from documents  ')).toEqual({ valid: true })
  })

  it.each([
    'WITH t AS (SELECT 1) SELECT * FROM t',
    'SHOW tables',
    'EXPLAIN SELECT 1',
  ])('rejects queries that do not start with SELECT: %s', (query) => {
    expect(validateSqlQuery(query)).toEqual({
      valid: false,
      reason: 'Query must start with SELECT. Only read-only SELECT queries are allowed.',
    })
  })

  it('rejects a stacked DROP statement', () => {
    expect(validateSqlQuery('SELECT * FROM t; DROP TABLE t')).toEqual({
      valid: false,
      reason: 'Query contains forbidden keyword: DROP. Only SELECT queries are allowed.',
    })
  })

  it('reports the forbidden keyword before the SELECT prefix check', () => {
    expect(validateSqlQuery('UPDATE t SET x=1')).toEqual({
      valid: false,
      reason: 'Query contains forbidden keyword: UPDATE. Only SELECT queries are allowed.',
    })
  })

  it('matches forbidden keywords case-insensitively', () => {
    const result = validateSqlQuery('select 1; delete from users')
    expect(result).toEqual({
      valid: false,
      reason: 'Query contains forbidden keyword: DELETE. Only SELECT queries are allowed.',
    })
  })

  it.each([
    'SELECT dropped_column FROM t',
    'SELECT created_at, updated_at FROM documents',
    'SELECT * FROM executions',
    'SELECT insertion_order FROM log',
  ])('does not reject keywords inside identifiers: %s', (query) => {
    expect(validateSqlQuery(query)).toEqual({ valid: true })
  })

  it('rejects empty and non-string input', () => {
    expect(validateSqlQuery('')).toEqual({
      valid: false,
      reason: 'Query must be a non-empty string',
    })
    expect(validateSqlQuery(42)).toEqual({
      valid: false,
      reason: 'Query must be a non-empty string',
    })
  })
})

describe('validateQuestion', () => {
  it('accepts a question of exactly 1000 characters', () => {
    expect(validateQuestion('q'.repeat(1000))).toEqual({ valid: true })
  })

  it('rejects a question of 1001 characters', () => {
    expect(validateQuestion('q'.repeat(1001))).toEqual({
      valid: false,
      reason: 'Question too long (1001 characters). Maximum allowed: 1000 characters',
    })
  })

  it('compares the untrimmed length with the limit', () => {
    const padded = `${' '.repeat(5)}${'q'.repeat(996)}`
    expect(padded.length).toBe(1001)
    expect(validateQuestion(padded).valid).toBe(false)
  })

  it('rejects whitespace-only questions', () => {
    expect(validateQuestion('  \n\t ')).toEqual({
      valid: false,
      reason: 'Question cannot be empty or whitespace only',
    })
  })

  it('honors a custom maximum length', () => {
    expect(validateQuestion('abcdef', 5).valid).toBe(false)
    expect(validateQuestion('abcde', 5).valid).toBe(true)
  })
})

describe('validateFilePath', () => {
  it('accepts a pdf path with an allowed extension', () => {
    expect(validateFilePath('/tmp/report.pdf', ['.pdf'])).toEqual({ valid: true })
  })

  it('compares extensions case-insensitively', () => {
    expect(validateFilePath('/tmp/REPORT.PDF', ['.pdf'])).toEqual({ valid: true })
  })

  it('rejects other extensions', () => {
    expect(validateFilePath('/tmp/doc.txt', ['.pdf'])).toEqual({
      valid: false,
      reason: 'File extension not allowed. Allowed: .pdf',
    })
  })

  it.each(['/tmp/../etc/passwd.pdf', '/etc/secrets.pdf', '/root/private.pdf'])(
    'rejects traversal and sensitive roots: %s',
    (filePath) => {
      expect(validateFilePath(filePath, ['.pdf'])).toEqual({
        valid: false,
        reason: 'Invalid file path: potential security risk',
      })
    }
  )

  it('skips the extension check when no extensions are given', () => {
    expect(validateFilePath('/tmp/notes.md')).toEqual({ valid: true })
  })
})

describe('validateDocumentId', () => {
  it.each(['doc-1', 'report_2024.v2', 'ABC123'])('accepts %s', (id) => {
    expect(validateDocumentId(id)).toEqual({ valid: true })
  })

  it.each(['doc 1', 'doc/1', '../doc', 'doc;drop'])('rejects %s', (id) => {
    expect(validateDocumentId(id).valid).toBe(false)
  })

  it('rejects an empty id', () => {
    expect(validateDocumentId('   ')).toEqual({
      valid: false,
      reason: 'Document ID must be a non-empty string',
    })
  })
})

describe('validateLimit', () => {
  it.each([1, 10, 500, 1000])('accepts %d', (limit) => {
    expect(validateLimit(limit)).toEqual({ valid: true })
  })

  it('rejects values below 1', () => {
    expect(validateLimit(0)).toEqual({ valid: false, reason: 'Limit must be at least 1' })
    expect(validateLimit(-5)).toEqual({ valid: false, reason: 'Limit must be at least 1' })
  })

  it('rejects values above the maximum', () => {
    expect(validateLimit(1001)).toEqual({
      valid: false,
      reason: 'Limit exceeds maximum allowed value of 1000',
    })
  })

  it('rejects non-integers', () => {
    expect(validateLimit(2.5)).toEqual({ valid: false, reason: 'Limit must be an integer' })
    expect(validateLimit('10')).toEqual({ valid: false, reason: 'Limit must be an integer' })
  })

  it('honors a custom maximum', () => {
    expect(validateLimit(51, 50).valid).toBe(false)
  })
})
