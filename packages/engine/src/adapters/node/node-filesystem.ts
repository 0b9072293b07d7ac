import * as fs from "node:fs/promises";
import {
  FileExistsError,
  type FileOpenMode,
  type IFileHandle,
  type IFileStat,
  type IFileSystem,
  readToEnd,
} from "../../interfaces/filesystem.js";

export class NodeFileHandle implements IFileHandle {
  constructor(private handle: fs.FileHandle) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }> {
    const result = await this.handle.read(buffer, offset, length, position);
    return { bytesRead: result.bytesRead };
  }

  async write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }> {
    const result = await this.handle.write(buffer, offset, length, position);
    return { bytesWritten: result.bytesWritten };
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return String(err.code);
  }
  return undefined;
}

/**
 * Paths are used exactly as given. Parent directories are not created, so
 * uploading into a missing directory fails.
 */
export class NodeFileSystem implements IFileSystem {
  async open(filePath: string, mode: FileOpenMode): Promise<IFileHandle> {
    try {
      const handle = await fs.open(filePath, mode);
      return new NodeFileHandle(handle);
    } catch (err) {
      if (mode === "wx" && errorCode(err) === "EEXIST") {
        throw new FileExistsError(filePath);
      }
      throw err;
    }
  }

  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async delete(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    const handle = await this.open(filePath, "r");
    try {
      const stats = await this.stat(filePath);
      if (!stats.isFile) {
        throw new Error(`EISDIR: not a regular file: ${filePath}`);
      }
      return await readToEnd(handle, stats.size);
    } finally {
      await handle.close();
    }
  }
}
