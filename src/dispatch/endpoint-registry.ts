/**
 * Registry of endpoints available to the dispatcher
 * @module dispatch/endpoint-registry
 */

import type { ProcessingStage } from '../core/status/stages.js'
import type { StageName } from '../types/config.js'
import { InvalidParameterError, requireNonEmptyString } from '../utils/errors.js'
import { EndpointNotRegisteredError } from './dispatch-error.js'
import type { Endpoint, SearchEndpoint, StageEndpoint } from './types.js'

/**
 * Maps endpoint ids, as written in the stage settings, to implementations.
 *
 * @example
 * ```typescript
 * const registry = new EndpointRegistry()
 *   .register(crossrefSearch)
 *   .register(titleCasePrep)
 *
 * registry.getStageEndpoint('prep', 'local.prep.title_case')
 * ```
 */
export class EndpointRegistry {
  private readonly endpoints = new Map<string, Endpoint>()

  /**
   * Registers an endpoint
   * @throws {InvalidParameterError} If the id is already taken
   */
  register(endpoint: Endpoint): this {
    const id = requireNonEmptyString(endpoint.id, 'endpoint.id')
    if (this.endpoints.has(id)) {
      throw new InvalidParameterError('endpoint.id', id, 'is already registered')
    }
    this.endpoints.set(id, endpoint)
    return this
  }

  has(id: string): boolean {
    return this.endpoints.has(id)
  }

  unregister(id: string): boolean {
    return this.endpoints.delete(id)
  }

  /**
   * Looks up a processing endpoint
   * @throws {EndpointNotRegisteredError} If no endpoint of that stage has the id
   */
  getStageEndpoint(stage: ProcessingStage, id: string): StageEndpoint {
    const endpoint = this.endpoints.get(id)
    if (!endpoint || endpoint.stage === 'retrieve' || endpoint.stage !== stage) {
      throw new EndpointNotRegisteredError(id, stage)
    }
    return endpoint
  }

  /**
   * Looks up a search endpoint
   * @throws {EndpointNotRegisteredError} If no search endpoint has the id
   */
  getSearchEndpoint(id: string): SearchEndpoint {
    const endpoint = this.endpoints.get(id)
    if (!endpoint || endpoint.stage !== 'retrieve') {
      throw new EndpointNotRegisteredError(id, 'retrieve')
    }
    return endpoint
  }

  /**
   * Ids registered for a stage, in registration order
   */
  idsFor(stage: StageName): string[] {
    return [...this.endpoints.values()]
      .filter((endpoint) => endpoint.stage === stage)
      .map((endpoint) => endpoint.id)
  }
}
