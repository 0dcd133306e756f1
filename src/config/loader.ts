/**
 * Reading and writing settings.json
 * @module config/loader
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { ProjectConfig } from '../types/config.js'
import { ConfigurationError, errorMessage } from '../utils/errors.js'
import { validateProjectConfig } from './validation.js'

export const SETTINGS_FILE = 'settings.json'

/**
 * Loads and validates a project configuration file
 *
 * @throws {ConfigurationError} If the file is unreadable, not JSON or invalid
 */
export async function loadProjectConfig(path: string): Promise<ProjectConfig> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(`cannot read '${path}': ${errorMessage(error)}`, undefined, { path })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigurationError(`'${path}' is not valid JSON: ${errorMessage(error)}`, undefined, { path })
  }
  return validateProjectConfig(parsed)
}

/**
 * Validates and writes a project configuration file
 */
export async function saveProjectConfig(path: string, config: ProjectConfig): Promise<void> {
  const valid = validateProjectConfig(config)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(valid, null, 2)}\n`, 'utf8')
}
