// Storage boundary. Ids are opaque; callers only pass back what they were given.

export type EntryKind = "folder" | "file";

export type StorageEntry = {
  id: string;
  name: string;
  kind: EntryKind;
  contentType?: string;
};

export interface Storage {
  /** Id of the folder `name` under `parentId`, created when missing. */
  ensurePath(parentId: string, name: string): Promise<string>;
  listChildren(id: string): Promise<StorageEntry[]>;
  /** Stores the bytes under `parentId`, replacing a file of the same name. */
  upload(parentId: string, filename: string, bytes: Buffer, contentType: string): Promise<string>;
}

export const CONTENT_TYPES = {
  pdf: "application/pdf",
  csv: "text/csv",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
} as const;
