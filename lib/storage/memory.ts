import type { Storage, StorageEntry } from "./types";

type Node = StorageEntry & { parent: string | null; bytes?: Buffer };

/** In-process storage, used by tests and dry runs. */
export class MemoryStorage implements Storage {
  readonly rootId = "root";
  private nodes = new Map<string, Node>([["root", { id: "root", name: "", kind: "folder", parent: null }]]);
  private seq = 0;

  private folder(id: string): Node {
    const node = this.nodes.get(id);
    if (!node || node.kind !== "folder") throw new Error(`No such folder: ${id}`);
    return node;
  }

  private child(parentId: string, name: string): Node | undefined {
    for (const n of this.nodes.values()) if (n.parent === parentId && n.name === name) return n;
    return undefined;
  }

  async ensurePath(parentId: string, name: string): Promise<string> {
    this.folder(parentId);
    const existing = this.child(parentId, name);
    if (existing) {
      if (existing.kind !== "folder") throw new Error(`${name} exists and is not a folder`);
      return existing.id;
    }
    const id = `n${++this.seq}`;
    this.nodes.set(id, { id, name, kind: "folder", parent: parentId });
    return id;
  }

  async listChildren(id: string): Promise<StorageEntry[]> {
    this.folder(id);
    return Array.from(this.nodes.values())
      .filter((n) => n.parent === id)
      .map(({ id: childId, name, kind, contentType }) => ({ id: childId, name, kind, contentType }));
  }

  async upload(parentId: string, filename: string, bytes: Buffer, contentType: string): Promise<string> {
    this.folder(parentId);
    const existing = this.child(parentId, filename);
    const id = existing?.id ?? `n${++this.seq}`;
    this.nodes.set(id, { id, name: filename, kind: "file", parent: parentId, contentType, bytes });
    return id;
  }

  read(id: string): Buffer | undefined {
    return this.nodes.get(id)?.bytes;
  }
}
