import chalk from 'chalk'
import { Command } from 'commander'
import { installExtensions, pushSchema } from '@legal-rag/db'
import { ConfigurationError } from '@legal-rag/pipeline'
import { EXIT_SUCCESS } from '../utils/output.js'
import { loadCliConfig, runAction } from '../utils/services.js'

export const initDbCommand = new Command('init-db')
  .description('Install pgvector and create the documents and chunks tables')
  .option('--no-push', 'only install the pgvector extension')
  .action(
    runAction(async (options: { push: boolean }) => {
      const { database } = loadCliConfig()
      if (!database.url) {
        throw new ConfigurationError('DATABASE_URL is required')
      }

      await installExtensions(database.url)
      if (options.push) {
        pushSchema()
      }
      console.log(chalk.green('\n✅ Database ready'))
      return EXIT_SUCCESS
    })
  )
