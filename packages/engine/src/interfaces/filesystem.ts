/**
 * Abstract File System Interfaces
 *
 * The router treats storage as a blob store keyed by path. Adapters map
 * these calls onto a concrete runtime.
 */

export interface IFileStat {
  size: number
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

/**
 * Open modes:
 * - `r`: read an existing file.
 * - `wx`: create a new empty file, failing with {@link FileExistsError}
 *   if the path already exists. Creation is atomic.
 */
export type FileOpenMode = 'r' | 'wx'

export interface IFileSystem {
  open(path: string, mode: FileOpenMode): Promise<IFileHandle>

  stat(path: string): Promise<IFileStat>

  exists(path: string): Promise<boolean>

  /** Read a whole file into memory. */
  readFile(path: string): Promise<Uint8Array>

  /** Remove a file. Removing a missing file is not an error. */
  delete(path: string): Promise<void>
}

export class FileExistsError extends Error {
  readonly code = 'EEXIST'

  constructor(readonly path: string) {
    super(`EEXIST: file already exists: ${path}`)
    this.name = 'FileExistsError'
  }
}

/** Read a file through its handle until end of file. */
export async function readToEnd(handle: IFileHandle, size: number): Promise<Uint8Array> {
  const out = new Uint8Array(size)
  let position = 0
  while (position < size) {
    const { bytesRead } = await handle.read(out, position, size - position, position)
    if (bytesRead === 0) break
    position += bytesRead
  }
  return position === size ? out : out.slice(0, position)
}

/** Write every byte of `data`, looping over partial writes. */
export async function writeAll(handle: IFileHandle, data: Uint8Array): Promise<void> {
  let position = 0
  while (position < data.length) {
    const { bytesWritten } = await handle.write(data, position, data.length - position, position)
    if (bytesWritten === 0) {
      throw new Error(`Short write: ${position} of ${data.length} bytes`)
    }
    position += bytesWritten
  }
}
