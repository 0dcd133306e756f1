/**
 * Fluent builder for project configuration
 * @module config/project-builder
 */

import type { ProcessingStage } from '../core/status/stages.js'
import {
  DEFAULT_DISPATCH_CONFIG,
  DEFAULT_MERGE_CONFIG,
  type DispatchConfig,
  type EndpointRef,
  type ProjectAuthor,
  type ProjectConfig,
  type ScalarConflictPolicy,
  type StageName,
  type StageSettings,
} from '../types/config.js'
import { BuilderSequenceError, requireNonEmptyString, requirePositiveInteger } from '../utils/errors.js'
import { validateProjectConfig } from './validation.js'

/**
 * Builder for the settings of one stage
 *
 * @example
 * ```typescript
 * project
 *   .stage('pdf_prep')
 *   .endpoint('local.pdf_prep.ocr', { language: 'en' })
 *   .timeout(60_000)
 *   .done()
 * ```
 */
export class StageSettingsBuilder {
  private readonly endpoints: EndpointRef[] = []
  private concurrencyLimit?: number
  private timeoutMs?: number
  /** @internal Reference to parent builder for chaining */
  public readonly _parent: ProjectBuilder

  constructor(parent: ProjectBuilder) {
    this._parent = parent
  }

  /**
   * Appends an endpoint; endpoints run in the order they are added
   */
  endpoint(id: string, options?: Record<string, unknown>): this {
    requireNonEmptyString(id, 'endpoint')
    this.endpoints.push(options ? { endpoint: id, options } : { endpoint: id })
    return this
  }

  concurrency(limit: number): this {
    this.concurrencyLimit = requirePositiveInteger(limit, 'concurrency')
    return this
  }

  timeout(ms: number): this {
    this.timeoutMs = requirePositiveInteger(ms, 'timeoutMs')
    return this
  }

  /**
   * Returns to the project builder
   */
  done(): ProjectBuilder {
    return this._parent
  }

  /** @internal */
  build(): StageSettings {
    const settings: StageSettings = { endpoints: [...this.endpoints] }
    if (this.concurrencyLimit !== undefined) settings.concurrency = this.concurrencyLimit
    if (this.timeoutMs !== undefined) settings.timeoutMs = this.timeoutMs
    return settings
  }
}

/**
 * Fluent builder producing a validated {@link ProjectConfig}.
 *
 * @example
 * ```typescript
 * const config = new ProjectBuilder()
 *   .title('Coordination in open source')
 *   .reviewType('literature_review')
 *   .author({ name: 'Ada Example', initials: 'AE' })
 *   .criterion('population', 'Studies of open source communities')
 *   .stage('prep').endpoint('local.prep.title_case').done()
 *   .build()
 * ```
 */
export class ProjectBuilder {
  private projectTitle?: string
  private type = 'literature_review'
  private readonly authors: ProjectAuthor[] = []
  private readonly criteria: Record<string, { explanation: string }> = {}
  private readonly stages = new Map<StageName, StageSettingsBuilder>()
  private dispatchConfig: DispatchConfig = { ...DEFAULT_DISPATCH_CONFIG }
  private policy: ScalarConflictPolicy = DEFAULT_MERGE_CONFIG.scalarConflictPolicy

  title(title: string): this {
    this.projectTitle = requireNonEmptyString(title, 'title')
    return this
  }

  reviewType(type: string): this {
    this.type = requireNonEmptyString(type, 'reviewType')
    return this
  }

  author(author: ProjectAuthor): this {
    this.authors.push({ ...author })
    return this
  }

  criterion(name: string, explanation: string): this {
    this.criteria[requireNonEmptyString(name, 'criterion')] = { explanation }
    return this
  }

  /**
   * Starts (or resumes) configuring a stage
   */
  stage(stage: ProcessingStage | 'retrieve'): StageSettingsBuilder {
    const existing = this.stages.get(stage)
    if (existing) return existing
    const builder = new StageSettingsBuilder(this)
    this.stages.set(stage, builder)
    return builder
  }

  dispatch(config: Partial<DispatchConfig>): this {
    this.dispatchConfig = { ...this.dispatchConfig, ...config }
    return this
  }

  mergePolicy(policy: ScalarConflictPolicy): this {
    this.policy = policy
    return this
  }

  /**
   * Builds and validates the configuration
   *
   * @throws {BuilderSequenceError} If title() or author() was never called
   * @throws {ConfigurationError} If the result is invalid
   */
  build(): ProjectConfig {
    if (this.projectTitle === undefined) {
      throw new BuilderSequenceError('build', 'title() must be called before build()')
    }
    if (this.authors.length === 0) {
      throw new BuilderSequenceError('build', 'at least one author() is required')
    }

    const stages: Partial<Record<StageName, StageSettings>> = {}
    for (const [stage, builder] of this.stages) {
      stages[stage] = builder.build()
    }

    return validateProjectConfig({
      project: { title: this.projectTitle, reviewType: this.type, authors: this.authors },
      screening: { criteria: this.criteria },
      stages,
      dispatch: this.dispatchConfig,
      merge: { scalarConflictPolicy: this.policy },
    })
  }
}
