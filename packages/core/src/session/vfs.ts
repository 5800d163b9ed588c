/**
 * Virtual Filesystem
 *
 * In-memory, session-scoped file tree the guest reads and writes through
 * requests. Paths are absolute POSIX-style paths inside the VFS; nothing here
 * touches the host filesystem.
 *
 * Security considerations:
 * - Root is read-only; writes, deletes and mkdir are only allowed beneath the
 *   configured writable roots (default /workspace and /tmp)
 * - `..` may not climb above `/`
 * - Individual files are capped at maxFileBytes
 * - Reads and snapshots return copies; callers cannot mutate stored bytes
 */

import type { ErrorPayload } from '../protocol/types.js';

export const VfsErrorCode = {
  NOT_FOUND: 'VFS_NOT_FOUND',
  PERMISSION_DENIED: 'VFS_PERMISSION_DENIED',
  NOT_A_DIRECTORY: 'VFS_NOT_A_DIRECTORY',
  IS_A_DIRECTORY: 'VFS_IS_A_DIRECTORY',
  FILE_TOO_LARGE: 'VFS_FILE_TOO_LARGE',
  INVALID_PATH: 'VFS_INVALID_PATH',
} as const;

export type VfsErrorCode = (typeof VfsErrorCode)[keyof typeof VfsErrorCode];

export class VfsError extends Error {
  public readonly code: VfsErrorCode;
  public readonly path: string;

  constructor(code: VfsErrorCode, path: string, message: string) {
    super(message);
    this.name = 'VfsError';
    this.code = code;
    this.path = path;
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message, details: { path: this.path } };
  }
}

export interface VfsOptions {
  writableRoots?: readonly string[];
  maxFileBytes?: number;
}

export const DEFAULT_WRITABLE_ROOTS: readonly string[] = ['/workspace', '/tmp'];
export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;

/**
 * Normalize an absolute VFS path: collapse repeated slashes, resolve `.` and
 * `..`, drop the trailing slash. Returns `/` for the root.
 */
export function normalizeVfsPath(path: string): string {
  if (!path.startsWith('/') || path.includes('\0')) {
    throw new VfsError(VfsErrorCode.INVALID_PATH, path, `Invalid path "${path}": must be absolute`);
  }

  const segments: string[] = [];
  for (const segment of path.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      if (segments.length === 0) {
        throw new VfsError(VfsErrorCode.INVALID_PATH, path, `Invalid path "${path}": escapes root`);
      }
      segments.pop();
      continue;
    }
    segments.push(segment);
  }
  return `/${segments.join('/')}`;
}

function parentOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index <= 0 ? '/' : path.slice(0, index);
}

function ancestorsOf(path: string): string[] {
  const ancestors: string[] = [];
  let current = path;
  while (current !== '/') {
    current = parentOf(current);
    ancestors.unshift(current);
  }
  return ancestors;
}

function isWithin(path: string, root: string): boolean {
  return root === '/' || path === root || path.startsWith(`${root}/`);
}

export class VirtualFilesystem {
  private readonly files = new Map<string, Uint8Array>();
  private readonly directories = new Set<string>();
  private readonly writableRoots: readonly string[];
  readonly maxFileBytes: number;

  constructor(options: VfsOptions = {}) {
    this.writableRoots = (options.writableRoots ?? DEFAULT_WRITABLE_ROOTS).map(normalizeVfsPath);
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
    this.initDirectories();
  }

  getWritableRoots(): readonly string[] {
    return this.writableRoots;
  }

  isWritable(path: string): boolean {
    const normalized = normalizeVfsPath(path);
    return this.writableRoots.some((root) => isWithin(normalized, root));
  }

  exists(path: string): boolean {
    const normalized = normalizeVfsPath(path);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  readFile(path: string): Uint8Array {
    const normalized = normalizeVfsPath(path);
    if (this.directories.has(normalized)) {
      throw new VfsError(VfsErrorCode.IS_A_DIRECTORY, normalized, `${normalized} is a directory`);
    }
    const data = this.files.get(normalized);
    if (!data) {
      throw new VfsError(VfsErrorCode.NOT_FOUND, normalized, `No such file: ${normalized}`);
    }
    return Uint8Array.from(data);
  }

  /**
   * Create or replace a file. Missing parent directories are created.
   */
  writeFile(path: string, data: Uint8Array): void {
    const normalized = this.requireWritable(path);
    if (this.directories.has(normalized)) {
      throw new VfsError(VfsErrorCode.IS_A_DIRECTORY, normalized, `${normalized} is a directory`);
    }
    if (data.byteLength > this.maxFileBytes) {
      throw new VfsError(
        VfsErrorCode.FILE_TOO_LARGE,
        normalized,
        `${normalized} is ${data.byteLength} bytes; the limit is ${this.maxFileBytes}`
      );
    }
    this.ensureDirectory(parentOf(normalized));
    this.files.set(normalized, Uint8Array.from(data));
  }

  /**
   * Sorted names of the direct children of a directory.
   */
  list(path: string): string[] {
    const normalized = normalizeVfsPath(path);
    if (this.files.has(normalized)) {
      throw new VfsError(VfsErrorCode.NOT_A_DIRECTORY, normalized, `${normalized} is not a directory`);
    }
    if (!this.directories.has(normalized)) {
      throw new VfsError(VfsErrorCode.NOT_FOUND, normalized, `No such directory: ${normalized}`);
    }

    const names = new Set<string>();
    for (const entry of [...this.directories, ...this.files.keys()]) {
      if (entry !== normalized && parentOf(entry) === normalized) {
        names.add(entry.slice(entry.lastIndexOf('/') + 1));
      }
    }
    return [...names].sort();
  }

  /**
   * Remove a file, or a directory and everything below it.
   * Writable roots themselves cannot be removed.
   */
  delete(path: string): void {
    const normalized = this.requireWritable(path);
    if (this.writableRoots.includes(normalized)) {
      throw new VfsError(VfsErrorCode.PERMISSION_DENIED, normalized, `Cannot remove ${normalized}`);
    }

    if (this.files.delete(normalized)) return;

    if (!this.directories.has(normalized)) {
      throw new VfsError(VfsErrorCode.NOT_FOUND, normalized, `No such file or directory: ${normalized}`);
    }
    for (const file of [...this.files.keys()]) {
      if (isWithin(file, normalized)) this.files.delete(file);
    }
    for (const dir of [...this.directories]) {
      if (isWithin(dir, normalized)) this.directories.delete(dir);
    }
  }

  /**
   * Create a directory and any missing parents. Existing directories are a no-op.
   */
  mkdir(path: string): void {
    this.ensureDirectory(this.requireWritable(path));
  }

  /** Copy of every file, keyed by path. */
  snapshot(): Record<string, Uint8Array> {
    const result: Record<string, Uint8Array> = {};
    for (const path of [...this.files.keys()].sort()) {
      const data = this.files.get(path);
      if (data) result[path] = Uint8Array.from(data);
    }
    return result;
  }

  /** Total bytes stored across all files. */
  totalBytes(): number {
    let total = 0;
    for (const data of this.files.values()) total += data.byteLength;
    return total;
  }

  clear(): void {
    this.files.clear();
    this.directories.clear();
    this.initDirectories();
  }

  private initDirectories(): void {
    this.directories.add('/');
    for (const root of this.writableRoots) {
      for (const dir of [...ancestorsOf(root), root]) this.directories.add(dir);
    }
  }

  private requireWritable(path: string): string {
    const normalized = normalizeVfsPath(path);
    if (!this.writableRoots.some((root) => isWithin(normalized, root))) {
      throw new VfsError(
        VfsErrorCode.PERMISSION_DENIED,
        normalized,
        `${normalized} is read-only; write under ${this.writableRoots.join(' or ')}`
      );
    }
    return normalized;
  }

  private ensureDirectory(path: string): void {
    for (const dir of [...ancestorsOf(path), path]) {
      if (this.files.has(dir)) {
        throw new VfsError(VfsErrorCode.NOT_A_DIRECTORY, dir, `${dir} is not a directory`);
      }
    }
    for (const dir of [...ancestorsOf(path), path]) this.directories.add(dir);
  }
}
