#!/usr/bin/env tsx
import 'dotenv/config'
import { Command } from 'commander'
import { deleteCommand, reembedCommand } from './commands/documents.js'
import { ingestCommand } from './commands/ingest.js'
import { initDbCommand } from './commands/init-db.js'
import { queryCommand } from './commands/query.js'

const program = new Command()
  .name('legal-rag')
  .description('Hierarchy-aware ingestion and retrieval for legal PDF documents')
  .version('0.1.0')
  .addCommand(ingestCommand)
  .addCommand(queryCommand)
  .addCommand(deleteCommand)
  .addCommand(reembedCommand)
  .addCommand(initDbCommand)

await program.parseAsync(process.argv)
