/**
 * Mirrors change log commits into a git working tree
 * @module history/git/git-mirror
 */

import { execFile } from 'node:child_process'
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Logger } from '../../types/logger.js'
import type { OperationRecord } from '../../types/operation.js'
import type { Snapshot } from '../../types/record.js'
import { LedgerError } from '../../utils/errors.js'
import type { Commit, CommitListener } from '../types.js'

/**
 * Runs a git command in `cwd` and resolves with its standard output
 */
export type GitRunner = (args: readonly string[], cwd: string) => Promise<string>

export interface GitMirrorOptions {
  /** Working tree of the review repository */
  cwd: string
  /** Directory, relative to `cwd`, receiving the exported files (default: `data`) */
  dataDir?: string
  runner?: GitRunner
  logger?: Logger
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends LedgerError {
  constructor(args: readonly string[], reason: string) {
    super(`git ${args.join(' ')} failed: ${reason}`, 'GIT_COMMAND_FAILED', { args: [...args], reason })
    this.name = 'GitCommandError'
  }
}

/**
 * Default runner using the git executable on PATH
 */
export const execGit: GitRunner = (args, cwd) =>
  new Promise((resolve, reject) => {
    execFile('git', [...args], { cwd }, (error, stdout, stderr) => {
      if (error) {
        reject(new GitCommandError(args, stderr.trim() || error.message))
        return
      }
      resolve(stdout)
    })
  })

/**
 * Human-readable commit message summarising an operation
 */
export function formatCommitReport(operation: OperationRecord, commitId: string): string {
  const lines = [`${operation.kind}: ${operation.name}`, '']
  const keys = Object.keys(operation.counts).sort()
  if (keys.length === 0) {
    lines.push('No record changes')
  }
  for (const key of keys) {
    lines.push(`  ${key}: ${operation.counts[key]}`)
  }
  if (operation.failures.length > 0) {
    lines.push('', `Failed (${operation.failures.length}):`)
    for (const failure of operation.failures) {
      lines.push(`  ${failure.recordId} [${failure.code}] ${failure.reason}`)
    }
  }
  lines.push('', `Ledger-Commit: ${commitId}`, `Operation-Id: ${operation.id}`)
  return lines.join('\n')
}

function statusIndex(snapshot: Snapshot): Record<string, string> {
  const index: Record<string, string> = {}
  for (const record of snapshot.records) {
    index[record.id] = record.status
  }
  return index
}

/**
 * Creates a commit listener that exports each snapshot and records it as a
 * git commit authored by the operation's actor.
 *
 * @example
 * ```typescript
 * const log = new ChangeLog(adapter, {
 *   listeners: [createGitMirror({ cwd: '/reviews/open-source' })],
 * })
 * ```
 */
export function createGitMirror(options: GitMirrorOptions): CommitListener {
  const runner = options.runner ?? execGit
  const dataDir = options.dataDir ?? 'data'

  return async (commit: Commit, snapshot: Snapshot) => {
    const target = join(options.cwd, dataDir)
    await mkdir(target, { recursive: true })
    await writeFile(join(target, 'records.json'), `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8')
    await writeFile(
      join(target, 'status.json'),
      `${JSON.stringify(statusIndex(snapshot), null, 2)}\n`,
      'utf8',
    )

    const { operation } = commit
    await runner(['add', '--', dataDir], options.cwd)
    await runner(
      [
        'commit',
        '--allow-empty',
        `--author=${operation.actor} <${operation.actor}@review.local>`,
        '-m',
        formatCommitReport(operation, commit.id),
      ],
      options.cwd,
    )
    options.logger?.info('Mirrored commit to git', { commit: commit.id, cwd: options.cwd })
  }
}
