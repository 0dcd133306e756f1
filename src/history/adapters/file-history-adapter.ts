/**
 * File-system history adapter
 * @module history/adapters/file-history-adapter
 */

import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises'
import { dirname, join, relative, sep } from 'node:path'
import type { Snapshot } from '../../types/record.js'
import { InvalidParameterError, errorMessage } from '../../utils/errors.js'
import { CorruptionDetectedError } from '../history-error.js'
import { decodeCommit, decodeSnapshot } from '../serialization.js'
import type { Commit, HistoryAdapter } from '../types.js'

const OBJECT_NAME = /^[0-9a-f]{64}$/
const REF_NAME = /^[A-Za-z0-9._-]+(\/[A-Za-z0-9._-]+)*$/

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (isMissing(error)) return null
    throw error
  }
}

/**
 * Writes through a temporary file so readers never see a partial object
 */
async function writeAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const temporary = `${path}.${process.pid}.tmp`
  await writeFile(temporary, content, 'utf8')
  await rename(temporary, path)
}

async function readEntries(directory: string) {
  try {
    return await readdir(directory, { withFileTypes: true })
  } catch (error) {
    if (isMissing(error)) return []
    throw error
  }
}

async function listFiles(directory: string): Promise<string[]> {
  const files: string[] = []
  for (const entry of await readEntries(directory)) {
    const path = join(directory, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path)))
    } else if (!entry.name.endsWith('.tmp')) {
      files.push(path)
    }
  }
  return files
}

/**
 * History adapter storing objects as JSON files in a directory:
 *
 * ```
 * <root>/objects/commits/<id>.json
 * <root>/objects/snapshots/<hash>.json
 * <root>/refs/heads/main
 * ```
 *
 * The directory is meant to live inside the review repository so the
 * surrounding version control carries it along with the records.
 */
export class FileHistoryAdapter implements HistoryAdapter {
  constructor(private readonly root: string) {}

  private objectPath(kind: 'commits' | 'snapshots', name: string): string {
    if (!OBJECT_NAME.test(name)) {
      throw new InvalidParameterError('name', name, 'must be a sha-256 hex digest')
    }
    return join(this.root, 'objects', kind, `${name}.json`)
  }

  private refPath(name: string): string {
    if (!REF_NAME.test(name) || name.split('/').some((part) => part === '..' || part === '.')) {
      throw new InvalidParameterError('name', name, 'is not a valid ref name')
    }
    return join(this.root, 'refs', ...name.split('/'))
  }

  async writeSnapshot(hash: string, snapshot: Snapshot): Promise<void> {
    const path = this.objectPath('snapshots', hash)
    if ((await readOptional(path)) !== null) return
    await writeAtomic(path, JSON.stringify(snapshot, null, 2))
  }

  async readSnapshot(hash: string): Promise<Snapshot | null> {
    const raw = await readOptional(this.objectPath('snapshots', hash))
    return raw === null ? null : decodeSnapshot(parseJson(raw, 'snapshot', hash), hash)
  }

  async writeCommit(commit: Commit): Promise<void> {
    const path = this.objectPath('commits', commit.id)
    if ((await readOptional(path)) !== null) return
    await writeAtomic(path, JSON.stringify(commit, null, 2))
  }

  async readCommit(id: string): Promise<Commit | null> {
    const raw = await readOptional(this.objectPath('commits', id))
    return raw === null ? null : decodeCommit(parseJson(raw, 'commit', id), id)
  }

  async listCommitIds(): Promise<string[]> {
    const files = await listFiles(join(this.root, 'objects', 'commits'))
    return files
      .map((file) => file.slice(file.lastIndexOf(sep) + 1).replace(/\.json$/, ''))
      .filter((name) => OBJECT_NAME.test(name))
      .sort()
  }

  async readRef(name: string): Promise<string | null> {
    const raw = await readOptional(this.refPath(name))
    return raw === null ? null : raw.trim()
  }

  async writeRef(name: string, commitId: string): Promise<void> {
    await writeAtomic(this.refPath(name), `${commitId}\n`)
  }

  async listRefs(): Promise<Record<string, string>> {
    const refsRoot = join(this.root, 'refs')
    const refs: Record<string, string> = {}
    for (const file of (await listFiles(refsRoot)).sort()) {
      const name = relative(refsRoot, file).split(sep).join('/')
      const target = await readOptional(file)
      if (target !== null) {
        refs[name] = target.trim()
      }
    }
    return refs
  }
}

function parseJson(raw: string, objectType: 'commit' | 'snapshot', name: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new CorruptionDetectedError(objectType, name, `invalid JSON: ${errorMessage(error)}`)
  }
}

/**
 * Creates a file-system history adapter rooted at `root`
 */
export function createFileHistoryAdapter(root: string): FileHistoryAdapter {
  return new FileHistoryAdapter(root)
}
