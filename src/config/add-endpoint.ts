/**
 * Adding endpoints to a configuration
 * @module config/add-endpoint
 */

import { isStageName } from '../core/status/stages.js'
import type { EndpointRef, ProjectConfig, StageName } from '../types/config.js'
import { ConfigurationError } from '../utils/errors.js'
import { validateProjectConfig } from './validation.js'

/**
 * Returns a copy of the configuration with the endpoint appended to the stage
 *
 * @throws {ConfigurationError} If the stage is unknown or already lists the endpoint
 *
 * @example
 * ```typescript
 * const next = addEndpointToConfig(config, 'pdf_get', { endpoint: 'local.pdf_get.unpaywall' })
 * ```
 */
export function addEndpointToConfig(config: ProjectConfig, stage: string, ref: EndpointRef): ProjectConfig {
  if (!isStageName(stage)) {
    throw new ConfigurationError(`unknown stage '${stage}'`, `stages.${stage}`)
  }
  const name: StageName = stage
  const current = config.stages[name]
  if (current?.endpoints.some((existing) => existing.endpoint === ref.endpoint)) {
    throw new ConfigurationError(
      `endpoint '${ref.endpoint}' is already configured for '${name}'`,
      `stages.${name}.endpoints`,
    )
  }

  const endpoint: EndpointRef = ref.options
    ? { endpoint: ref.endpoint, options: { ...ref.options } }
    : { endpoint: ref.endpoint }
  return validateProjectConfig({
    ...config,
    stages: {
      ...config.stages,
      [name]: { ...current, endpoints: [...(current?.endpoints ?? []), endpoint] },
    },
  })
}
