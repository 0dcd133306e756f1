/**
 * Project initialisation
 * @module config/init
 */

import { generateOperationId } from '../dispatch/execution-context.js'
import type { ChangeLog } from '../history/change-log.js'
import type { Commit } from '../history/types.js'
import type { ProjectConfig } from '../types/config.js'
import { emptySnapshot } from '../types/record.js'
import { ConfigurationError, requireNonEmptyString } from '../utils/errors.js'

export interface InitOptions {
  actor: string
  clock?: () => Date
}

/**
 * Writes the root commit of a new review: an empty snapshot bound to an
 * `init` operation
 *
 * @throws {ConfigurationError} If the history already has commits
 */
export async function initProject(
  changeLog: ChangeLog,
  config: ProjectConfig,
  options: InitOptions,
): Promise<Commit> {
  const actor = requireNonEmptyString(options.actor, 'actor')
  if ((await changeLog.headId()) !== null) {
    throw new ConfigurationError('the review history is already initialised', undefined, {
      branch: changeLog.branch,
    })
  }

  return changeLog.commit(emptySnapshot(), {
    id: generateOperationId(),
    kind: 'init',
    name: 'init',
    actor,
    timestamp: (options.clock ?? (() => new Date()))().toISOString(),
    counts: {},
    transitions: [],
    failures: [],
    details: {
      title: config.project.title,
      reviewType: config.project.reviewType,
      criteria: Object.keys(config.screening.criteria).sort(),
    },
  })
}
