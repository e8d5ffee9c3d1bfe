/**
 * Domain type for an image file discovered in the source directory.
 */

export interface FileEntry {
  /** Absolute path of the source file; unique within a run */
  readonly id: string;
  /** Base file name, reused as the destination file name */
  readonly name: string;
  /** Size in bytes, recorded once at enumeration */
  readonly sizeBytes: number;
}

export const compareById = (a: FileEntry, b: FileEntry): number =>
  a.id < b.id ? -1 : a.id > b.id ? 1 : 0;

export const totalSize = (entries: readonly FileEntry[]): number =>
  entries.reduce((acc, entry) => acc + entry.sizeBytes, 0);
