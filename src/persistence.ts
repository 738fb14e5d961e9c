import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";

/** File written next to the vector index describing how it was built. */
export const MANIFEST_FILE = "manifest.json";

const ManifestSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string().min(1),
  dimensions: z.number().int().positive(),
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().nonnegative(),
  chunkCount: z.number().int().nonnegative(),
  documentCount: z.number().int().nonnegative(),
  builtAt: z.string(),
});

/**
 * Build metadata persisted alongside the index. `embeddingModel` is checked on
 * load so query vectors never meet chunk vectors from another model.
 */
export type IndexManifest = z.infer<typeof ManifestSchema>;

/**
 * Owns the on-disk layout of one index directory: manifest I/O plus the
 * staging / commit dance that swaps a freshly built index in wholesale.
 * A rebuild never patches the live directory.
 */
export class Persistence {
  private readonly indexDir: string;
  private readonly verbose: boolean;

  /**
   * @param indexDir Directory holding the live index.
   * @param verbose  Emit verbose logging.
   */
  public constructor(indexDir: string, verbose = false) {
    this.indexDir = path.resolve(indexDir);
    this.verbose = verbose;
  }

  public getIndexDir(): string {
    return this.indexDir;
  }

  /**
   * Read the manifest of the live index (or of `dir` when given).
   * Returns null when the file does not exist.
   *
   * @throws {Error} If the manifest exists but is corrupt.
   */
  public async readManifest(dir = this.indexDir): Promise<IndexManifest | null> {
    const file = path.join(dir, MANIFEST_FILE);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
    const parsed = ManifestSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Corrupt index manifest at ${file}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  public async writeManifest(dir: string, manifest: IndexManifest): Promise<void> {
    await fs.writeFile(path.join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
    if (this.verbose) console.error(`[docs-chat][verbose] Wrote manifest to ${dir}`);
  }

  /** Fresh sibling directory on the same filesystem, so commit can rename it. */
  public async createStagingDir(): Promise<string> {
    const dir = `${this.indexDir}.staging-${randomUUID()}`;
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  /** Replace the live index with the staged one. */
  public async commit(stagingDir: string): Promise<void> {
    const retired = `${this.indexDir}.old-${randomUUID()}`;
    let hadPrevious = true;
    try {
      await fs.rename(this.indexDir, retired);
    } catch (e) {
      if (!isNotFound(e)) throw e;
      hadPrevious = false;
    }
    try {
      await fs.rename(stagingDir, this.indexDir);
    } catch (e) {
      if (hadPrevious) await fs.rename(retired, this.indexDir);
      throw e;
    }
    if (hadPrevious) await fs.rm(retired, { recursive: true, force: true });
    if (this.verbose) console.error(`[docs-chat][verbose] Committed index to ${this.indexDir}`);
  }

  /** Remove a staging directory after a failed build. */
  public async discard(stagingDir: string): Promise<void> {
    await fs.rm(stagingDir, { recursive: true, force: true });
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
