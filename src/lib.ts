export { PathEntry, DEFAULT_DIRECTORY_PERMISSIONS } from './application/services/path-entry';
export { ACCESS_MODE } from './application/ports/file-system.port';
export type {
  AccessMode,
  FileStats,
  FileSystemEntry,
  FileSystemPort,
  MakeDirectoryOptions,
} from './application/ports/file-system.port';
export { ENTRY_TYPE, MISSING_ENTRY } from './domain/entry-type';
export type { EntryInfo, EntryPermissions, EntryType } from './domain/entry-type';
export { CONTENT_OPERATION, OperationError } from './domain/errors';
export type { ContentOperation } from './domain/errors';
export { NodeFileSystem } from './infrastructure/node-file-system';
