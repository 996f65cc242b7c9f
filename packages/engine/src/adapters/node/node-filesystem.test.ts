import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeFileSystem } from "./node-filesystem.js";

describe("NodeFileSystem", () => {
  const fileSystem = new NodeFileSystem();
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "node-fs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads file bytes", async () => {
    const file = join(dir, "body.bin");
    await writeFile(file, Buffer.from([1, 2, 255]));

    const data = await fileSystem.readFile(file);

    expect(data).toBeInstanceOf(Uint8Array);
    expect(Array.from(data)).toEqual([1, 2, 255]);
  });

  it("distinguishes files from directories", async () => {
    const file = join(dir, "a.txt");
    const sub = join(dir, "sub");
    await writeFile(file, "abc");
    await mkdir(sub);

    expect(await fileSystem.stat(file)).toEqual({ isFile: true });
    expect(await fileSystem.stat(sub)).toEqual({ isFile: false });
  });

  it("rejects stat on missing paths", async () => {
    await expect(fileSystem.stat(join(dir, "missing"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
