import fs from 'node:fs';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';

import type {
  AccessMode,
  FileStats,
  FileSystemEntry,
  FileSystemPort,
  MakeDirectoryOptions,
} from '../application/ports/file-system.port';
import { ACCESS_MODE } from '../application/ports/file-system.port';
import { ENTRY_TYPE } from '../domain/entry-type';
import type { EntryType } from '../domain/entry-type';

const ACCESS_FLAGS: Record<AccessMode, number> = {
  [ACCESS_MODE.READ]: fs.constants.R_OK,
  [ACCESS_MODE.WRITE]: fs.constants.W_OK,
  [ACCESS_MODE.EXECUTE]: fs.constants.X_OK,
};

const mapEntryType = (entry: Dirent | Stats): EntryType => {
  if (entry.isFile()) {
    return ENTRY_TYPE.FILE;
  }
  if (entry.isDirectory()) {
    return ENTRY_TYPE.DIRECTORY;
  }
  if (entry.isSymbolicLink()) {
    return ENTRY_TYPE.SYMLINK;
  }
  return ENTRY_TYPE.OTHER;
};

export class NodeFileSystem implements FileSystemPort {
  public stat(targetPath: string): FileStats {
    const stats = fs.statSync(targetPath);
    return {
      type: mapEntryType(stats),
      sizeBytes: stats.size,
      modifiedAt: stats.mtime,
    };
  }

  public access(targetPath: string, mode: AccessMode): void {
    fs.accessSync(targetPath, ACCESS_FLAGS[mode]);
  }

  public listEntries(targetPath: string): FileSystemEntry[] {
    const entries = fs.readdirSync(targetPath, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      path: path.join(targetPath, entry.name),
      type: mapEntryType(entry),
    }));
  }

  public readFile(targetPath: string): string {
    return fs.readFileSync(targetPath, 'utf8');
  }

  public writeFile(targetPath: string, contents: string): void {
    fs.writeFileSync(targetPath, contents, 'utf8');
  }

  public appendFile(targetPath: string, contents: string): void {
    fs.appendFileSync(targetPath, contents, 'utf8');
  }

  public makeDirectory(targetPath: string, options: MakeDirectoryOptions): string | undefined {
    return fs.mkdirSync(targetPath, { recursive: options.recursive, mode: options.mode });
  }

  public changeMode(targetPath: string, mode: number): void {
    fs.chmodSync(targetPath, mode);
  }

  public rename(sourcePath: string, destinationPath: string): void {
    fs.renameSync(sourcePath, destinationPath);
  }

  public removeDirectory(targetPath: string): void {
    fs.rmdirSync(targetPath);
  }

  public removeFile(targetPath: string): void {
    fs.unlinkSync(targetPath);
  }
}
