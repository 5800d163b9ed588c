export { Session, type SessionOptions } from './session.js';
export {
  VirtualFilesystem,
  VfsError,
  VfsErrorCode,
  normalizeVfsPath,
  DEFAULT_WRITABLE_ROOTS,
  DEFAULT_MAX_FILE_BYTES,
  type VfsOptions,
} from './vfs.js';
