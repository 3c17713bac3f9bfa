import { readFile } from 'node:fs/promises'
import * as yaml from 'js-yaml'
import type { ZodError } from 'zod'
import { ConfigError } from '@datafaucet/common'
import { generatorConfigSchema } from './config-schema'
import type { GeneratorConfig } from './types'

const formatIssues = (error: ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })

/**
 * Validates an already parsed configuration document.
 * @param raw Parsed YAML/JSON content.
 * @returns The validated configuration with camelCase keys.
 * @throws ConfigError listing every validation issue.
 */
export const parseGeneratorConfig = (raw: unknown): GeneratorConfig => {
  const result = generatorConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error))
  }
  return result.data
}

/**
 * Reads, parses and validates a YAML or JSON configuration file.
 * @param filePath Path to the configuration file.
 * @returns The validated configuration.
 * @throws ConfigError when the file is missing, unparsable or invalid.
 */
export const loadGeneratorConfig = async (filePath: string): Promise<GeneratorConfig> => {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new ConfigError(`Unable to read configuration file ${filePath}`, [], { cause: error })
  }

  let raw: unknown
  try {
    raw = yaml.load(content, { filename: filePath })
  } catch (error) {
    throw new ConfigError(`Unable to parse configuration file ${filePath}`, [], { cause: error })
  }

  if (raw == null || typeof raw !== 'object') {
    throw new ConfigError(`Configuration file ${filePath} must contain a mapping`)
  }

  return parseGeneratorConfig(raw)
}
