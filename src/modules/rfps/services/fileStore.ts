// src/modules/rfps/services/fileStore.ts
// Uploaded RFP bytes on local disk, one file per upload under a generated
// UUID. The original filename is metadata on the rfps row, never a path.

import crypto, { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";

export type StoredFile = {
  key: string;
  sha256: string;
  sizeBytes: number;
};

export interface FileStore {
  save(bytes: Buffer): Promise<StoredFile>;
  /** null when nothing is stored under `key`. */
  read(key: string): Promise<Buffer | null>;
  remove(key: string): Promise<void>;
}

const KEY_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function sha256(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
  );
}

export class LocalFileStore implements FileStore {
  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    if (!KEY_RE.test(key)) {
      throw new Error(`Invalid storage key: ${key}`);
    }
    return path.join(this.dir, key);
  }

  async save(bytes: Buffer): Promise<StoredFile> {
    await fs.mkdir(this.dir, { recursive: true });
    const key = randomUUID();
    // wx: never clobber an existing blob
    await fs.writeFile(this.pathFor(key), bytes, { flag: "wx" });
    return { key, sha256: sha256(bytes), sizeBytes: bytes.length };
  }

  async read(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.pathFor(key));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }
}
