/**
 * Validation of project configuration
 * @module config/validation
 */

import { isStageName } from '../core/status/stages.js'
import {
  DEFAULT_DISPATCH_CONFIG,
  DEFAULT_MERGE_CONFIG,
  SCALAR_CONFLICT_POLICIES,
  type EndpointRef,
  type ProjectAuthor,
  type ProjectConfig,
  type ScreeningCriterion,
  type StageName,
  type StageSettings,
} from '../types/config.js'
import { ConfigurationError, isPlainObject } from '../utils/errors.js'

const CRITERION_NAME = /^[A-Za-z][A-Za-z0-9_]*$/

function objectAt(value: unknown, field: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ConfigurationError(`'${field}' must be an object`, field)
  }
  return value
}

function stringAt(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(`'${field}' must be a non-empty string`, field)
  }
  return value
}

function positiveIntegerAt(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`'${field}' must be a positive integer`, field, { value })
  }
  return value
}

function validateAuthor(value: unknown, field: string): ProjectAuthor {
  const raw = objectAt(value, field)
  const author: ProjectAuthor = {
    name: stringAt(raw.name, `${field}.name`),
    initials: stringAt(raw.initials, `${field}.initials`),
  }
  if (raw.email !== undefined) {
    author.email = stringAt(raw.email, `${field}.email`)
  }
  return author
}

function validateEndpointRef(value: unknown, field: string): EndpointRef {
  const raw = objectAt(value, field)
  const ref: EndpointRef = { endpoint: stringAt(raw.endpoint, `${field}.endpoint`) }
  if (raw.options !== undefined) {
    ref.options = objectAt(raw.options, `${field}.options`)
  }
  return ref
}

function validateStage(value: unknown, field: string): StageSettings {
  const raw = objectAt(value, field)
  if (!Array.isArray(raw.endpoints)) {
    throw new ConfigurationError(`'${field}.endpoints' must be an array`, `${field}.endpoints`)
  }
  const endpoints = raw.endpoints.map((ref, index) => validateEndpointRef(ref, `${field}.endpoints[${index}]`))
  const seen = new Set<string>()
  for (const ref of endpoints) {
    if (seen.has(ref.endpoint)) {
      throw new ConfigurationError(`endpoint '${ref.endpoint}' is listed twice`, `${field}.endpoints`)
    }
    seen.add(ref.endpoint)
  }

  const settings: StageSettings = { endpoints }
  if (raw.concurrency !== undefined) {
    settings.concurrency = positiveIntegerAt(raw.concurrency, `${field}.concurrency`)
  }
  if (raw.timeoutMs !== undefined) {
    settings.timeoutMs = positiveIntegerAt(raw.timeoutMs, `${field}.timeoutMs`)
  }
  return settings
}

/**
 * Checks a configuration value and returns it typed, with defaults filled in
 *
 * @throws {ConfigurationError} Naming the first offending field
 *
 * @example
 * ```typescript
 * const config = validateProjectConfig(JSON.parse(await readFile('settings.json', 'utf8')))
 * ```
 */
export function validateProjectConfig(value: unknown): ProjectConfig {
  const raw = objectAt(value, 'settings')

  const project = objectAt(raw.project, 'project')
  if (!Array.isArray(project.authors)) {
    throw new ConfigurationError(`'project.authors' must be an array`, 'project.authors')
  }
  const authors = project.authors.map((author, index) => validateAuthor(author, `project.authors[${index}]`))

  const criteria: Record<string, ScreeningCriterion> = {}
  const screening = raw.screening === undefined ? { criteria: {} } : objectAt(raw.screening, 'screening')
  for (const [name, criterion] of Object.entries(objectAt(screening.criteria ?? {}, 'screening.criteria'))) {
    if (!CRITERION_NAME.test(name)) {
      throw new ConfigurationError(
        `criterion name '${name}' must start with a letter and hold only letters, digits and underscores`,
        `screening.criteria.${name}`,
      )
    }
    const rawCriterion = objectAt(criterion, `screening.criteria.${name}`)
    criteria[name] = { explanation: stringAt(rawCriterion.explanation, `screening.criteria.${name}.explanation`) }
  }

  const stages: Partial<Record<StageName, StageSettings>> = {}
  for (const [stage, settings] of Object.entries(objectAt(raw.stages ?? {}, 'stages'))) {
    if (!isStageName(stage)) {
      throw new ConfigurationError(`unknown stage '${stage}'`, `stages.${stage}`)
    }
    stages[stage] = validateStage(settings, `stages.${stage}`)
  }

  const dispatch = objectAt(raw.dispatch ?? {}, 'dispatch')
  const merge = objectAt(raw.merge ?? {}, 'merge')
  const policy = merge.scalarConflictPolicy ?? DEFAULT_MERGE_CONFIG.scalarConflictPolicy
  const scalarConflictPolicy = SCALAR_CONFLICT_POLICIES.find((candidate) => candidate === policy)
  if (scalarConflictPolicy === undefined) {
    throw new ConfigurationError(
      `'merge.scalarConflictPolicy' must be one of: ${SCALAR_CONFLICT_POLICIES.join(', ')}`,
      'merge.scalarConflictPolicy',
      { value: policy },
    )
  }

  return {
    project: {
      title: stringAt(project.title, 'project.title'),
      reviewType: stringAt(project.reviewType, 'project.reviewType'),
      authors,
    },
    screening: { criteria },
    stages,
    dispatch: {
      concurrency: positiveIntegerAt(dispatch.concurrency ?? DEFAULT_DISPATCH_CONFIG.concurrency, 'dispatch.concurrency'),
      timeoutMs: positiveIntegerAt(dispatch.timeoutMs ?? DEFAULT_DISPATCH_CONFIG.timeoutMs, 'dispatch.timeoutMs'),
    },
    merge: { scalarConflictPolicy },
  }
}
