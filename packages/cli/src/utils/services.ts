import chalk from 'chalk'
import { InvalidArgumentError } from 'commander'
import {
  createRagServices,
  errorMessage,
  loadPipelineConfig,
  type PipelineConfig,
  type RagServices,
} from '@legal-rag/pipeline'
import { exitCodeForError } from './output.js'

export interface ServiceOverrides {
  /** Keep everything in memory instead of PostgreSQL */
  dryRun?: boolean
  concurrency?: number
  skipUnchanged?: boolean
  /** Directory where downloaded sources are cached */
  downloadDir?: string
}

/**
 * Environment configuration with command line flags applied on top
 */
export function loadCliConfig(
  overrides: ServiceOverrides = {},
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const config = loadPipelineConfig(env)
  return {
    ...config,
    ingestion: {
      ...config.ingestion,
      concurrency: overrides.concurrency ?? config.ingestion.concurrency,
      skipUnchanged: overrides.skipUnchanged ?? config.ingestion.skipUnchanged,
    },
  }
}

/**
 * Run fn with freshly wired services and release their connections afterwards
 */
export async function withServices<T>(
  overrides: ServiceOverrides,
  fn: (services: RagServices, config: PipelineConfig) => Promise<T>
): Promise<T> {
  const config = loadCliConfig(overrides)
  const services = createRagServices(config, {
    dryRun: overrides.dryRun,
    cacheDir: overrides.downloadDir,
  })
  try {
    return await fn(services, config)
  } finally {
    await services.close()
  }
}

/**
 * Commander action wrapper: the action resolves to an exit code, and a thrown
 * error is printed and mapped to one
 */
export function runAction<A extends unknown[]>(
  action: (...args: A) => Promise<number>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      process.exitCode = await action(...args)
    } catch (error) {
      console.error(chalk.red(`✗ ${errorMessage(error)}`))
      process.exitCode = exitCodeForError(error)
    }
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

export function parseThreshold(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed < -1 || parsed > 1) {
    throw new InvalidArgumentError('Must be a number between -1 and 1.')
  }
  return parsed
}
