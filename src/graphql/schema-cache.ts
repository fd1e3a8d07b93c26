import { mkdir, readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { SchemaCacheError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";

const logger = getLogger("schema-cache");

const SCHEMA_FILE_EXTENSION = ".graphql";

export interface SchemaCacheOptions {
  enabled: boolean;
  directory: string | null;
}

// Cache directory locks are shared by every SchemaCache of the process.
const directoryLocks: Map<string, Promise<void>> = new Map();

// fs errors fail `instanceof Error` when raised in another realm, such as under Jest.
function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * On-disk store of introspected schemas, one SDL file per
 * (endpoint host, backend version) pair.
 */
export class SchemaCache {
  readonly enabled: boolean;
  readonly directory: string | null;

  constructor(options: SchemaCacheOptions) {
    if (options.enabled && !options.directory) {
      throw new SchemaCacheError(
        "<none>",
        "A cache directory must be specified to enable schema caching"
      );
    }
    this.enabled = options.enabled;
    this.directory = options.enabled ? options.directory : null;
  }

  static fileName(endpoint: string, version: string): string {
    const host = new URL(endpoint).host.replace(/[^A-Za-z0-9._-]/g, "_");
    const safeVersion = version.replace(/[^A-Za-z0-9._-]/g, "_");
    return `${host}__${safeVersion}${SCHEMA_FILE_EXTENSION}`;
  }

  schemaPath(endpoint: string, version: string): string | null {
    if (this.directory === null) {
      return null;
    }
    return join(this.directory, SchemaCache.fileName(endpoint, version));
  }

  /**
   * Returns the cached SDL, or null when the file is missing or empty.
   */
  async read(path: string): Promise<string | null> {
    try {
      const sdl = await readFile(path, "utf-8");
      if (sdl.length === 0) {
        logger.debug({ path }, "Cached schema file is empty");
        return null;
      }
      return sdl;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new SchemaCacheError(path, "could not read cached schema", error);
    }
  }

  async write(path: string, sdl: string): Promise<void> {
    const directory = this.requireDirectory(path);
    const tmpPath = `${path}.${uuidv4()}.tmp`;

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(tmpPath, sdl, "utf-8");
      await rename(tmpPath, path);
    } catch (error) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        if (!isNotFound(cleanupError)) {
          logger.warn({ path: tmpPath, error: cleanupError }, "Could not remove temporary schema file");
        }
      });
      throw new SchemaCacheError(path, "could not write schema", error);
    }

    logger.info({ path, bytes: Buffer.byteLength(sdl) }, "Schema cached");
  }

  /** Deletes the cached schemas of one endpoint host, every version. */
  async purgeHost(endpoint: string): Promise<number> {
    const prefix = SchemaCache.fileName(endpoint, "").replace(SCHEMA_FILE_EXTENSION, "");
    return this.purge((file) => file.startsWith(prefix));
  }

  /** Deletes every cached schema in the directory. */
  async purgeAll(): Promise<number> {
    return this.purge(() => true);
  }

  /**
   * Runs `fn` while holding the in-process lock of the cache directory.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (this.directory === null) {
      return fn();
    }

    const key = this.directory;
    const previous = directoryLocks.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chained = previous.then(() => current);
    directoryLocks.set(key, chained);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (directoryLocks.get(key) === chained) {
        directoryLocks.delete(key);
      }
    }
  }

  private async purge(matches: (file: string) => boolean): Promise<number> {
    if (this.directory === null) {
      return 0;
    }
    const directory = this.directory;

    let files: string[];
    try {
      files = await readdir(directory);
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw new SchemaCacheError(directory, "could not list cache directory", error);
    }

    const targets = files.filter((file) => file.endsWith(SCHEMA_FILE_EXTENSION) && matches(file));
    for (const file of targets) {
      try {
        await unlink(join(directory, file));
      } catch (error) {
        if (!isNotFound(error)) {
          throw new SchemaCacheError(join(directory, file), "could not delete cached schema", error);
        }
      }
    }

    if (targets.length > 0) {
      logger.info({ directory, removed: targets }, "Purged cached schemas");
    }
    return targets.length;
  }

  private requireDirectory(path: string): string {
    if (this.directory === null) {
      throw new SchemaCacheError(path, "schema caching is disabled");
    }
    return this.directory;
  }
}
