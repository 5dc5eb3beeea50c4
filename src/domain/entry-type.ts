import type { ValueOf } from '../types/value-of';

export const ENTRY_TYPE = {
  FILE: 'file',
  DIRECTORY: 'directory',
  SYMLINK: 'symlink',
  OTHER: 'other',
} as const;

export type EntryType = ValueOf<typeof ENTRY_TYPE>;

export const MISSING_ENTRY = 'missing';

export type EntryPermissions = {
  read: boolean;
  write: boolean;
  execute: boolean;
};

/**
 * Point-in-time snapshot of a path. `sizeBytes` and `modifiedAt` use -1 when
 * the value cannot be determined, the same sentinel as the entry queries.
 */
export type EntryInfo = {
  path: string;
  name: string;
  directory: string;
  extension: string;
  type: EntryType | typeof MISSING_ENTRY;
  mimeType: string | null;
  sizeBytes: number;
  modifiedAt: number;
  permissions: EntryPermissions;
};
