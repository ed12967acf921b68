import { mkdir, readFile, readdir, rm, rmdir, writeFile } from "node:fs/promises";
import path from "node:path";

export type ArtifactKind = "source" | "output";

export interface ArtifactStorage {
  /** Stores bytes and returns an opaque reference. */
  put(jobId: string, kind: ArtifactKind, bytes: Buffer): Promise<string>;
  get(ref: string): Promise<Buffer | null>;
  remove(ref: string): Promise<void>;
}

const FILE_NAMES: Record<ArtifactKind, string> = {
  source: "source.pdf",
  output: "translated.pdf",
};

const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/** Keeps artifacts under `<root>/<jobId>/`; references are root-relative paths. */
export class FileArtifactStorage implements ArtifactStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async put(jobId: string, kind: ArtifactKind, bytes: Buffer): Promise<string> {
    if (!SAFE_SEGMENT.test(jobId)) {
      throw new Error(`Refusing to store artifact for job id "${jobId}"`);
    }
    const ref = `${jobId}/${FILE_NAMES[kind]}`;
    const target = this.resolve(ref);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, bytes);
    return ref;
  }

  async get(ref: string): Promise<Buffer | null> {
    try {
      return await readFile(this.resolve(ref));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async remove(ref: string): Promise<void> {
    const target = this.resolve(ref);
    await rm(target, { force: true });
    const dir = path.dirname(target);
    if (dir === this.root) return;
    const remaining = await readdir(dir).catch((error: unknown) => {
      if (isMissingFile(error)) return null;
      throw error;
    });
    if (remaining && remaining.length === 0) {
      await rmdir(dir);
    }
  }

  private resolve(ref: string): string {
    const target = path.resolve(this.root, ref);
    if (!target.startsWith(`${this.root}${path.sep}`)) {
      throw new Error(`Artifact reference escapes storage root: ${ref}`);
    }
    return target;
  }
}
