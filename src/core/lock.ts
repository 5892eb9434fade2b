import { link, outputFile, readJson, remove, rename, stat } from "fs-extra"
import { BuildLockedError, isErrnoException } from "./exceptions"

export interface LockOwner {
  pid: number
  startedAt: string
}

export interface BuildLock {
  readonly path: string
  release (): Promise<void>
}

interface HolderChecks {
  isAlive: (pid: number) => boolean
  graceMs: number
}

/** how long a lock that can't be read yet still counts as being written */
export const UNREADABLE_LOCK_GRACE_MS = 10_000

/**
 * Takes the build lock or fails right away when a live process holds it.
 * The lock appears with its content already written (hard link of a finished file).
 * A lock left by a dead process, or unreadable past the grace period, is replaced
 */
export async function acquireBuildLock (lockPath: string, {
  pid = process.pid,
  isAlive = isProcessAlive,
  graceMs = UNREADABLE_LOCK_GRACE_MS
}: {
  pid?: number
  isAlive?: (pid: number) => boolean
  graceMs?: number
} = {}): Promise<BuildLock> {
  const owner: LockOwner = {
    pid,
    startedAt: new Date().toISOString()
  }
  const checks: HolderChecks = { isAlive, graceMs }
  const pending = `${lockPath}.${pid}.pending`

  await outputFile(pending, JSON.stringify(owner, null, 2))
  try {
    for (let attempt = 0; attempt < 3; attempt++) {
      if (await linkIfAbsent(pending, lockPath)) {
        return {
          path: lockPath,
          release: () => releaseBuildLock(lockPath)
        }
      }

      const holder = await liveHolder(lockPath, checks)
      if (holder) {
        throw new BuildLockedError(lockPath, holder.pid)
      }

      await setAsideStaleLock(lockPath, pid, checks)
    }
  } finally {
    await remove(pending)
  }

  throw new BuildLockedError(lockPath)
}

export function releaseBuildLock (lockPath: string): Promise<void> {
  return remove(lockPath)
}

export async function readLockOwner (lockPath: string): Promise<LockOwner | null> {
  let content: unknown
  try {
    content = await readJson(lockPath)
  } catch {
    return null
  }

  if (isLockOwner(content)) {
    return content
  }

  return null
}

function isLockOwner (value: unknown): value is LockOwner {
  return typeof value === "object"
    && value !== null
    && "pid" in value
    && typeof value.pid === "number"
    && "startedAt" in value
    && typeof value.startedAt === "string"
}

export function isProcessAlive (pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (e) {
    // the process exists but belongs to someone else
    return isErrnoException(e) && e.code === "EPERM"
  }
}

async function linkIfAbsent (from: string, to: string): Promise<boolean> {
  try {
    await link(from, to)
    return true
  } catch (e) {
    if (isErrnoException(e) && e.code === "EEXIST") {
      return false
    }
    throw e
  }
}

/** null when the lock at `lockPath` is stale or gone */
async function liveHolder (lockPath: string, { isAlive, graceMs }: HolderChecks): Promise<{ pid?: number } | null> {
  const current = await readLockOwner(lockPath)
  if (current) {
    return isAlive(current.pid) ? { pid: current.pid } : null
  }

  const modifiedAt = await modifiedTime(lockPath)
  if (modifiedAt === null) {
    return null
  }

  return Date.now() - modifiedAt < graceMs ? {} : null
}

async function modifiedTime (path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      return null
    }
    throw e
  }
}

/**
 * Moves the stale lock out of the way. Only one contender gets to move a given file;
 * if it was replaced by a live lock after the staleness check, it is put back
 */
async function setAsideStaleLock (lockPath: string, pid: number, checks: HolderChecks): Promise<void> {
  const aside = `${lockPath}.${pid}.stale`

  try {
    await rename(lockPath, aside)
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      return
    }
    throw e
  }

  try {
    const holder = await liveHolder(aside, checks)
    if (holder) {
      // a newer owner may already hold the path again, it keeps it either way
      await linkIfAbsent(aside, lockPath)
      throw new BuildLockedError(lockPath, holder.pid)
    }
  } finally {
    await remove(aside)
  }
}
