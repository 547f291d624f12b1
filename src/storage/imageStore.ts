import fs from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";

export interface ImageStore {
  save(bytes: Buffer): Promise<string>;
  read(imageRef: string): Promise<Buffer>;
}

const IMAGE_REF_PATTERN = /^[0-9a-f-]{36}$/;

/** Stores uploads as opaque files; callers only ever see the image reference. */
export class FileImageStore implements ImageStore {
  constructor(private readonly rootDir: string) {}

  async save(bytes: Buffer): Promise<string> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const imageRef = uuidv4();
    await fs.writeFile(this.pathFor(imageRef), bytes);
    return imageRef;
  }

  async read(imageRef: string): Promise<Buffer> {
    return fs.readFile(this.pathFor(imageRef));
  }

  private pathFor(imageRef: string): string {
    if (!IMAGE_REF_PATTERN.test(imageRef)) {
      throw new Error(`Invalid image reference: ${imageRef}`);
    }
    return path.join(this.rootDir, `${imageRef}.img`);
  }
}

export class MemoryImageStore implements ImageStore {
  private readonly images = new Map<string, Buffer>();

  async save(bytes: Buffer): Promise<string> {
    const imageRef = uuidv4();
    this.images.set(imageRef, Buffer.from(bytes));
    return imageRef;
  }

  async read(imageRef: string): Promise<Buffer> {
    const bytes = this.images.get(imageRef);
    if (!bytes) {
      throw new Error(`Image ${imageRef} not found`);
    }
    return bytes;
  }
}
