import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalFileStore, sha256 } from "../../../src/modules/rfps/services/fileStore";

describe("LocalFileStore", () => {
  let dir: string;
  let store: LocalFileStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rfp-files-"));
    // nested dir is created on first save
    store = new LocalFileStore(path.join(dir, "uploads"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("stores bytes under a generated key and reads them back", async () => {
    const bytes = Buffer.from("%PDF-1.4 test");
    const stored = await store.save(bytes);

    expect(stored.key).toMatch(/^[0-9a-f-]{36}$/);
    expect(stored.sizeBytes).toBe(bytes.length);
    expect(stored.sha256).toBe(sha256(bytes));
    expect(await store.read(stored.key)).toEqual(bytes);
  });

  it("gives every upload its own key", async () => {
    const a = await store.save(Buffer.from("first"));
    const b = await store.save(Buffer.from("second"));

    expect(a.key).not.toBe(b.key);
    expect((await store.read(a.key))?.toString()).toBe("first");
    expect((await store.read(b.key))?.toString()).toBe("second");
  });

  it("returns null for a missing blob", async () => {
    expect(await store.read("00000000-0000-4000-8000-000000000000")).toBeNull();
  });

  it("removes blobs and tolerates removing twice", async () => {
    const { key } = await store.save(Buffer.from("bye"));
    await store.remove(key);
    await store.remove(key);
    expect(await store.read(key)).toBeNull();
  });

  it("refuses keys that are not UUIDs", async () => {
    await expect(store.read("../../etc/passwd")).rejects.toThrow("Invalid storage key");
  });
});
