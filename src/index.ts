#!/usr/bin/env node
// Entry point for the RAG/DB MCP Server

import { startServer } from './server-main.js'

// Global error handling
process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason)
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error)
  process.exit(1)
})

// Execute main
void startServer()
