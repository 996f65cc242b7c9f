/**
 * Abstract File System Interface
 *
 * The resolver only ever checks that a route's path is a regular file and
 * reads it whole, so that is all this seam exposes.
 */

export interface IFileStat {
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics. Rejects when the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Read the whole file. */
  readFile(path: string): Promise<Uint8Array>
}
