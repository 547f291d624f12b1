import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FileImageStore, MemoryImageStore } from "../imageStore";

describe("FileImageStore", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "leafscan-images-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("round-trips bytes through an opaque reference", async () => {
    const store = new FileImageStore(path.join(root, "uploads"));
    const ref = await store.save(Buffer.from([1, 2, 3]));

    expect(ref).toMatch(/^[0-9a-f-]{36}$/);
    expect(fs.existsSync(path.join(root, "uploads", `${ref}.img`))).toBe(true);
    expect(Array.from(await store.read(ref))).toEqual([1, 2, 3]);
  });

  it("refuses references that could escape the store", async () => {
    const store = new FileImageStore(root);
    await expect(store.read("../etc/passwd")).rejects.toThrow("Invalid image reference: ../etc/passwd");
  });
});

describe("MemoryImageStore", () => {
  it("copies bytes on save", async () => {
    const store = new MemoryImageStore();
    const bytes = Buffer.from([9, 9]);
    const ref = await store.save(bytes);
    bytes[0] = 0;

    expect(Array.from(await store.read(ref))).toEqual([9, 9]);
    await expect(store.read("unknown")).rejects.toThrow("Image unknown not found");
  });
});
