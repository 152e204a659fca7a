import { promises as fs, type Dirent } from "fs";
import path from "path";
import type { Storage, StorageEntry } from "./types";
import { CONTENT_TYPES } from "./types";

const BY_EXTENSION: Record<string, string> = {
  ".pdf": CONTENT_TYPES.pdf,
  ".csv": CONTENT_TYPES.csv,
  ".xlsx": CONTENT_TYPES.xlsx,
};

function safeName(name: string): string {
  const clean = name.replace(/[\\/]/g, "_").trim();
  if (clean === "" || clean === "." || clean === "..") throw new Error(`Invalid path segment: ${JSON.stringify(name)}`);
  return clean;
}

/**
 * Directory-tree storage. Ids are paths relative to the root directory;
 * the root itself is "".
 */
export class LocalStorage implements Storage {
  readonly rootId = "";

  constructor(readonly rootDir: string) {}

  private abs(id: string): string {
    return path.join(this.rootDir, id);
  }

  async ensurePath(parentId: string, name: string): Promise<string> {
    const id = path.join(parentId, safeName(name));
    await fs.mkdir(this.abs(id), { recursive: true });
    return id;
  }

  async listChildren(id: string): Promise<StorageEntry[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.abs(id), { withFileTypes: true });
    } catch (e) {
      if (typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT") return [];
      throw e;
    }
    return entries
      .filter((d) => d.isDirectory() || d.isFile())
      .map((d): StorageEntry => ({
        id: path.join(id, d.name),
        name: d.name,
        kind: d.isDirectory() ? "folder" : "file",
        contentType: d.isFile() ? BY_EXTENSION[path.extname(d.name).toLowerCase()] : undefined,
      }));
  }

  async upload(parentId: string, filename: string, bytes: Buffer, _contentType: string): Promise<string> {
    const id = path.join(parentId, safeName(filename));
    await fs.mkdir(this.abs(parentId), { recursive: true });
    await fs.writeFile(this.abs(id), bytes);
    return id;
  }
}
