import { describe, expect, it } from "vitest";
import { FileExistsError, writeAll } from "../interfaces/filesystem.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { InMemoryFileSystem } from "./in-memory-filesystem.js";

describe("InMemoryFileSystem", () => {
  it("creates files exclusively with wx", async () => {
    const fs = new InMemoryFileSystem();

    const handle = await fs.open("/store/a.bin", "wx");
    await writeAll(handle, fromString("hello"));
    await handle.close();

    await expect(fs.open("/store/a.bin", "wx")).rejects.toBeInstanceOf(
      FileExistsError,
    );
    expect(decodeToString(await fs.readFile("/store/a.bin"))).toBe("hello");
  });

  it("supports positional writes through one handle", async () => {
    const fs = new InMemoryFileSystem();
    const handle = await fs.open("/chunks.bin", "wx");

    const head = fromString("hello ");
    const tail = fromString("world");
    await handle.write(head, 0, head.length, 0);
    await handle.write(tail, 0, tail.length, head.length);
    await handle.close();

    expect(decodeToString(await fs.readFile("/chunks.bin"))).toBe("hello world");
    expect((await fs.stat("/chunks.bin")).size).toBe(11);
  });

  it("keys paths verbatim", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/root/../a", fromString("x"));

    expect(await fs.exists("/root/../a")).toBe(true);
    expect(await fs.exists("/a")).toBe(false);
  });

  it("refuses writes through read handles and closed handles", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/r.txt", fromString("r"));

    const reader = await fs.open("/r.txt", "r");
    const data = fromString("w");
    await expect(reader.write(data, 0, 1, 0)).rejects.toThrow("EBADF");
    await reader.close();
    await expect(reader.read(new Uint8Array(1), 0, 1, 0)).rejects.toThrow(
      "File handle is closed",
    );
  });

  it("injects one-shot create and write failures", async () => {
    const fs = new InMemoryFileSystem();
    fs.rejectCreate("/c");
    fs.rejectWrite("/w");

    await expect(fs.open("/c", "wx")).rejects.toThrow("EACCES");
    const retry = await fs.open("/c", "wx");
    await retry.close();

    const handle = await fs.open("/w", "wx");
    await expect(writeAll(handle, fromString("x"))).rejects.toThrow("ENOSPC");
    await writeAll(handle, fromString("x"));
    expect(decodeToString(await fs.readFile("/w"))).toBe("x");
  });

  it("deletes files and ignores missing ones", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/gone.bin", fromString("x"));

    await fs.delete("/gone.bin");
    await fs.delete("/never-existed");

    expect(await fs.exists("/gone.bin")).toBe(false);
    expect(fs.size).toBe(0);
  });

  it("injects a one-shot close failure and refuses a second close", async () => {
    const fs = new InMemoryFileSystem();
    fs.rejectClose("/c.bin");

    const handle = await fs.open("/c.bin", "wx");
    await writeAll(handle, fromString("kept"));
    await expect(handle.close()).rejects.toThrow("EIO");
    await expect(handle.close()).rejects.toThrow("File handle is closed");
    expect(decodeToString(await fs.readFile("/c.bin"))).toBe("kept");
  });

  it("distinguishes directories from files", async () => {
    const fs = new InMemoryFileSystem();
    await fs.mkdir("/dir");

    expect(await fs.stat("/dir")).toEqual({
      size: 0,
      isDirectory: true,
      isFile: false,
    });
    await expect(fs.readFile("/dir")).rejects.toThrow("EISDIR");
    await expect(fs.stat("/missing")).rejects.toThrow("ENOENT");
  });
});
