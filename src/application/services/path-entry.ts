import path from 'node:path';

import { ACCESS_MODE } from '../ports/file-system.port';
import type { AccessMode, FileStats, FileSystemEntry, FileSystemPort } from '../ports/file-system.port';
import { ENTRY_TYPE, MISSING_ENTRY } from '../../domain/entry-type';
import type { EntryInfo, EntryType } from '../../domain/entry-type';
import { CONTENT_OPERATION, OperationError } from '../../domain/errors';
import { NodeFileSystem } from '../../infrastructure/node-file-system';
import { getLogger } from '../../utils/get-logger';
import { DIRECTORY_MIME_TYPE, lookupMimeType } from '../../utils/lookup-mime-type';

export const DEFAULT_DIRECTORY_PERMISSIONS = 0o775;

const defaultFileSystem = new NodeFileSystem();

const isHidden = (entry: FileSystemEntry) => entry.name.startsWith('.');

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * A filesystem path and the operations on whatever it designates.
 *
 * Nothing is cached: every query goes back to the filesystem. Queries and
 * mutations report failure through their return value (false, -1 or an empty
 * list); only `read`, `append` and `write` throw, with an {@link OperationError}.
 */
export class PathEntry {
  private path: string;

  public constructor(
    targetPath: string,
    private readonly fileSystem: FileSystemPort = defaultFileSystem,
  ) {
    this.path = targetPath.endsWith(path.sep) ? targetPath.slice(0, -1) : targetPath;
  }

  public toString(): string {
    return this.getPath();
  }

  public getPath(): string {
    return this.path;
  }

  public getDirectory(): string {
    return path.dirname(this.path);
  }

  public getName(): string {
    return path.basename(this.path);
  }

  public getExtension(): string {
    const name = this.getName();
    const index = name.lastIndexOf('.');
    return index === -1 ? '' : name.slice(index + 1);
  }

  public getMimeType(): string | null {
    const stats = this.statOrNull();
    if (!stats) {
      return null;
    }
    if (stats.type === ENTRY_TYPE.DIRECTORY) {
      return DIRECTORY_MIME_TYPE;
    }
    return lookupMimeType(this.getExtension());
  }

  public exists(): boolean {
    return this.statOrNull() !== null;
  }

  public canExecute(): boolean {
    return this.isFile() && this.hasAccess(ACCESS_MODE.EXECUTE);
  }

  public canRead(): boolean {
    return this.hasAccess(ACCESS_MODE.READ);
  }

  public canWrite(): boolean {
    return this.hasAccess(ACCESS_MODE.WRITE);
  }

  public isFile(): boolean {
    return this.statOrNull()?.type === ENTRY_TYPE.FILE;
  }

  public isDirectory(): boolean {
    return this.statOrNull()?.type === ENTRY_TYPE.DIRECTORY;
  }

  /** Size in bytes, or -1 on failure. */
  public length(): number {
    return this.statOrNull()?.sizeBytes ?? -1;
  }

  public size(): number {
    return this.length();
  }

  public count(): number {
    return this.length();
  }

  /** Unix timestamp (seconds) of the last modification, or -1 on failure. */
  public lastModified(): number {
    const stats = this.statOrNull();
    return stats ? Math.floor(stats.modifiedAt.getTime() / 1000) : -1;
  }

  public describe(): EntryInfo {
    const stats = this.statOrNull();
    return {
      path: this.path,
      name: this.getName(),
      directory: this.getDirectory(),
      extension: this.getExtension(),
      type: stats?.type ?? MISSING_ENTRY,
      mimeType: this.getMimeType(),
      sizeBytes: this.length(),
      modifiedAt: this.lastModified(),
      permissions: {
        read: this.canRead(),
        write: this.canWrite(),
        execute: this.canExecute(),
      },
    };
  }

  public listAll(recursive = false, showHidden = false): string[] {
    return this.list(recursive, showHidden, null);
  }

  public listDirectories(recursive = false, showHidden = false): string[] {
    return this.list(recursive, showHidden, ENTRY_TYPE.DIRECTORY);
  }

  public listFiles(recursive = false, showHidden = false): string[] {
    return this.list(recursive, showHidden, ENTRY_TYPE.FILE);
  }

  public makeFile(override = false): boolean {
    if (this.exists() && !override) {
      return false;
    }

    return this.attempt('Create file', () => this.fileSystem.writeFile(this.path, ''));
  }

  /**
   * Create the directory with exactly `permissions`, whatever the process
   * umask. With `recursive`, missing ancestors get the same permissions.
   */
  public makeDirectory(recursive = false, permissions = DEFAULT_DIRECTORY_PERMISSIONS): boolean {
    if (this.exists()) {
      return false;
    }

    return this.attempt('Create directory', () => {
      const firstCreated = this.fileSystem.makeDirectory(this.path, { recursive, mode: permissions });
      for (const created of this.createdDirectories(firstCreated)) {
        this.fileSystem.changeMode(created, permissions);
      }
    });
  }

  public move(destination: string, override = false): boolean {
    if (!this.exists()) {
      return false;
    }

    const target = new PathEntry(destination, this.fileSystem);
    if (target.exists() && !override) {
      return false;
    }

    const moved = this.attempt('Move', () => this.fileSystem.rename(this.path, target.getPath()));
    if (moved) {
      this.path = target.getPath();
    }
    return moved;
  }

  public rename(newName: string, override = false): boolean {
    return this.move(`${this.getDirectory()}${path.sep}${path.basename(newName)}`, override);
  }

  /**
   * Recursive removal reports true once the walk is over: a child that could
   * not be deleted is only logged at debug level.
   *
   * The directory check follows links, so a recursive call on a link to a
   * directory empties the link's target; the link and the target stay.
   */
  public removeDirectory(recursive = false): boolean {
    if (!recursive) {
      return this.attempt('Remove directory', () => this.fileSystem.removeDirectory(this.path));
    }

    if (!this.isDirectory()) {
      return false;
    }

    this.removeChildren(this.path);
    this.attempt('Remove directory', () => this.fileSystem.removeDirectory(this.path));
    return true;
  }

  public removeFile(): boolean {
    if (!this.isFile()) {
      return false;
    }

    return this.attempt('Remove file', () => this.fileSystem.removeFile(this.path));
  }

  /** @throws OperationError when the content cannot be read. */
  public read(): string {
    try {
      return this.fileSystem.readFile(this.path);
    } catch (error) {
      throw new OperationError(CONTENT_OPERATION.READ, error);
    }
  }

  /** @throws OperationError when the content cannot be appended. */
  public append(content: string): void {
    try {
      this.fileSystem.appendFile(this.path, content);
    } catch (error) {
      throw new OperationError(CONTENT_OPERATION.APPEND, error);
    }
  }

  /** @throws OperationError when the content cannot be written. */
  public write(content: string): void {
    try {
      this.fileSystem.writeFile(this.path, content);
    } catch (error) {
      throw new OperationError(CONTENT_OPERATION.WRITE, error);
    }
  }

  private statOrNull(targetPath = this.path): FileStats | null {
    try {
      return this.fileSystem.stat(targetPath);
    } catch {
      return null;
    }
  }

  private hasAccess(mode: AccessMode): boolean {
    try {
      this.fileSystem.access(this.path, mode);
      return true;
    } catch {
      return false;
    }
  }

  private attempt(action: string, operation: () => void, targetPath = this.path): boolean {
    try {
      operation();
      return true;
    } catch (error) {
      getLogger().debug({ path: targetPath, error: errorMessage(error) }, `${action} failed`);
      return false;
    }
  }

  /** `wanted` null lists every entry. */
  private list(recursive: boolean, showHidden: boolean, wanted: EntryType | null): string[] {
    if (!this.isDirectory()) {
      return [];
    }

    const names: string[] = [];
    this.collect(this.path, recursive, showHidden, wanted, names);
    return names;
  }

  // Pre-order: a directory is recorded before anything below it
  private collect(
    directory: string,
    recursive: boolean,
    showHidden: boolean,
    wanted: EntryType | null,
    names: string[],
  ): void {
    for (const entry of this.readEntries(directory)) {
      if (!showHidden && isHidden(entry)) {
        continue;
      }
      if (wanted === null || this.targetType(entry) === wanted) {
        names.push(entry.name);
      }
      if (recursive && entry.type === ENTRY_TYPE.DIRECTORY) {
        this.collect(entry.path, recursive, showHidden, wanted, names);
      }
    }
  }

  // A link counts as what it points to; null for a dangling link
  private targetType(entry: FileSystemEntry): EntryType | null {
    if (entry.type !== ENTRY_TYPE.SYMLINK) {
      return entry.type;
    }
    return this.statOrNull(entry.path)?.type ?? null;
  }

  private readEntries(directory: string): FileSystemEntry[] {
    try {
      return this.fileSystem.listEntries(directory);
    } catch (error) {
      getLogger().debug({ path: directory, error: errorMessage(error) }, 'List directory failed');
      return [];
    }
  }

  // Children first, hidden entries included; links are unlinked, never followed
  private removeChildren(directory: string): void {
    for (const entry of this.readEntries(directory)) {
      if (entry.type === ENTRY_TYPE.DIRECTORY) {
        this.removeChildren(entry.path);
        this.attempt('Remove directory', () => this.fileSystem.removeDirectory(entry.path), entry.path);
      } else {
        this.attempt('Remove file', () => this.fileSystem.removeFile(entry.path), entry.path);
      }
    }
  }

  private createdDirectories(firstCreated: string | undefined): string[] {
    if (firstCreated === undefined) {
      return [this.path];
    }

    const created: string[] = [];
    let current = path.resolve(this.path);
    const first = path.resolve(firstCreated);
    while (current.startsWith(first)) {
      created.push(current);
      const parent = path.dirname(current);
      if (parent === current) {
        break;
      }
      current = parent;
    }
    return created;
  }
}
