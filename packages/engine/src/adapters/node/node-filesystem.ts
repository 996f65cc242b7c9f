import * as fs from "node:fs/promises";
import type { IFileStat, IFileSystem } from "../../interfaces/filesystem.js";

export class NodeFileSystem implements IFileSystem {
  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(filePath);
    return { isFile: stats.isFile() };
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    const data = await fs.readFile(filePath);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
}
