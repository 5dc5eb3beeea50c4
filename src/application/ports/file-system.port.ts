import type { ValueOf } from '../../types/value-of';
import type { EntryType } from '../../domain/entry-type';

export type FileSystemEntry = {
  name: string;
  path: string;
  type: EntryType;
};

export type FileStats = {
  type: EntryType;
  sizeBytes: number;
  modifiedAt: Date;
};

export const ACCESS_MODE = {
  READ: 'read',
  WRITE: 'write',
  EXECUTE: 'execute',
} as const;

export type AccessMode = ValueOf<typeof ACCESS_MODE>;

export type MakeDirectoryOptions = {
  recursive: boolean;
  mode: number;
};

/**
 * Synchronous filesystem access. Every method throws the underlying error on
 * failure; callers decide how a failure is reported.
 */
export interface FileSystemPort {
  stat(path: string): FileStats;
  access(path: string, mode: AccessMode): void;
  listEntries(path: string): FileSystemEntry[];
  readFile(path: string): string;
  writeFile(path: string, contents: string): void;
  appendFile(path: string, contents: string): void;
  /** Returns the first directory created when `recursive` is set. */
  makeDirectory(path: string, options: MakeDirectoryOptions): string | undefined;
  changeMode(path: string, mode: number): void;
  rename(sourcePath: string, destinationPath: string): void;
  removeDirectory(path: string): void;
  removeFile(path: string): void;
}
