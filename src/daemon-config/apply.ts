import { copyFile, mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ApplyFailureReason, ApplyResult, RecommendedConfig } from '../types/mirror.js';
import { logger } from '../utils/logger.js';

export const MIRRORS_FIELD = 'registry-mirrors';

export interface ConfigAppliedEvent {
  path: string;
  backupPath: string | null;
  mirrors: string[];
  appliedAt: string;
}

export interface ApplyOptions {
  path: string;
  backupPath: string;
  /** Told about every successful write; restarting the daemon is up to the listener. */
  notify?: (event: ConfigAppliedEvent) => void;
}

type DaemonConfig = Record<string, unknown>;

const log = logger.child({ component: 'daemon-config' });

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'EACCES' || code === 'EPERM';
}

function failure(reason: ApplyFailureReason, message: string, err?: unknown): ApplyResult {
  log.warn({ reason, err }, message);
  return { ok: false, reason, message };
}

function isPlainObject(value: unknown): value is DaemonConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses an existing config file. Anything unreadable counts as empty. */
export function parseDaemonConfig(raw: string): DaemonConfig {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isPlainObject(parsed)) return parsed;
    log.warn('Existing daemon config is not an object, starting from empty');
  } catch (err) {
    log.warn({ err }, 'Existing daemon config is not valid JSON, starting from empty');
  }
  return {};
}

/** Replaces the mirror list and keeps every other field in place. */
export function mergeMirrors(existing: DaemonConfig, mirrors: readonly string[]): DaemonConfig {
  return { ...existing, [MIRRORS_FIELD]: [...mirrors] };
}

export function formatDaemonConfig(config: DaemonConfig): string {
  return `${JSON.stringify(config, null, 4)}\n`;
}

async function readExisting(file: string): Promise<Buffer | null> {
  try {
    return await readFile(file);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw err;
  }
}

async function writeAtomically(file: string, content: string): Promise<void> {
  const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await writeFile(tmp, content, 'utf-8');
    await rename(tmp, file);
  } catch (err) {
    await unlink(tmp).catch((cleanupErr: unknown) => {
      if (errorCode(cleanupErr) !== 'ENOENT') {
        log.warn({ err: cleanupErr, tmp }, 'Failed to remove temporary config file');
      }
    });
    throw err;
  }
}

/**
 * Writes the recommended mirrors into the daemon config file.
 *
 * The previous file is copied to `backupPath` first, and the new content
 * replaces the file in one rename. Failures come back as values.
 */
export async function applyRecommendation(
  recommended: RecommendedConfig,
  options: ApplyOptions,
): Promise<ApplyResult> {
  const { path: target, backupPath, notify } = options;

  if (recommended.mirrors.length === 0) {
    return failure('no-available-mirrors', 'No available mirrors, daemon config left unchanged');
  }

  try {
    await mkdir(path.dirname(target), { recursive: true });
  } catch (err) {
    return failure('mkdir-failed', `Cannot create config directory ${path.dirname(target)}`, err);
  }

  let previous: Buffer | null;
  try {
    previous = await readExisting(target);
  } catch (err) {
    return isPermissionError(err)
      ? failure('permission-denied', `Permission denied reading ${target}`, err)
      : failure('write-failed', `Cannot read ${target}`, err);
  }

  if (previous) {
    try {
      await copyFile(target, backupPath);
    } catch (err) {
      return failure('backup-failed', `Cannot back up ${target} to ${backupPath}`, err);
    }
  }

  const existing = previous ? parseDaemonConfig(previous.toString('utf-8')) : {};
  const merged = mergeMirrors(existing, recommended.mirrors);

  try {
    await writeAtomically(target, formatDaemonConfig(merged));
  } catch (err) {
    return isPermissionError(err)
      ? failure('permission-denied', `Permission denied writing ${target}`, err)
      : failure('write-failed', `Cannot write ${target}`, err);
  }

  const event: ConfigAppliedEvent = {
    path: target,
    backupPath: previous ? backupPath : null,
    mirrors: [...recommended.mirrors],
    appliedAt: new Date().toISOString(),
  };
  log.info({ path: target, mirrors: event.mirrors }, 'Daemon config updated');
  try {
    notify?.(event);
  } catch (err) {
    log.error({ err }, 'Config applied listener failed');
  }

  return { ok: true, path: target, backupPath: event.backupPath, mirrors: event.mirrors };
}
