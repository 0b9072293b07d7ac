import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { FileExistsError, writeAll } from "../../interfaces/filesystem.js";
import { NodeFileSystem } from "./node-filesystem.js";

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "hearth-fs-test-"));
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("NodeFileSystem", () => {
  it("creates a new file and refuses a second exclusive create", async () => {
    const nodeFs = new NodeFileSystem();
    const target = path.join(tmpDir, "upload.bin");

    const handle = await nodeFs.open(target, "wx");
    await writeAll(handle, new Uint8Array([9, 8, 7]));
    await handle.close();

    await expect(nodeFs.open(target, "wx")).rejects.toBeInstanceOf(
      FileExistsError,
    );
    expect(Array.from(await fs.readFile(target))).toEqual([9, 8, 7]);
  });

  it("reads a whole file", async () => {
    const nodeFs = new NodeFileSystem();
    const target = path.join(tmpDir, "read.bin");
    const data = new Uint8Array(200_000);
    for (let i = 0; i < data.length; i++) data[i] = i % 251;
    await fs.writeFile(target, data);

    expect(await nodeFs.readFile(target)).toEqual(data);
  });

  it("does not create missing parent directories", async () => {
    const nodeFs = new NodeFileSystem();
    const target = path.join(tmpDir, "missing", "child.bin");

    const attempt = nodeFs.open(target, "wx");
    await expect(attempt).rejects.toMatchObject({ code: "ENOENT" });
    expect(await nodeFs.exists(path.join(tmpDir, "missing"))).toBe(false);
  });

  it("rejects reading a directory", async () => {
    const nodeFs = new NodeFileSystem();

    await expect(nodeFs.readFile(tmpDir)).rejects.toThrow("EISDIR");
  });

  it("reports existence", async () => {
    const nodeFs = new NodeFileSystem();
    await fs.writeFile(path.join(tmpDir, "here.txt"), "x");

    expect(await nodeFs.exists(path.join(tmpDir, "here.txt"))).toBe(true);
    expect(await nodeFs.exists(path.join(tmpDir, "gone.txt"))).toBe(false);
  });

  it("deletes a file and ignores a missing one", async () => {
    const nodeFs = new NodeFileSystem();
    const target = path.join(tmpDir, "partial.bin");
    await fs.writeFile(target, "xx");

    await nodeFs.delete(target);
    await nodeFs.delete(path.join(tmpDir, "never-there.bin"));

    expect(await nodeFs.exists(target)).toBe(false);
  });
});
