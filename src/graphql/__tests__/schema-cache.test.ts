import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SchemaCacheError } from "../../errors/index.js";
import { SchemaCache } from "../schema-cache.js";

const ENDPOINT = "http://localhost:4000/api/label/v2/graphql";

describe("SchemaCache", () => {
  let directory: string;
  let cache: SchemaCache;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "schema-cache-"));
    cache = new SchemaCache({ enabled: true, directory });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("names files after the endpoint host and backend version", () => {
    expect(SchemaCache.fileName(ENDPOINT, "2.134.1")).toBe("localhost_4000__2.134.1.graphql");
    expect(SchemaCache.fileName("https://cloud.example.test/graphql", "v/1 rc")).toBe(
      "cloud.example.test__v_1_rc.graphql"
    );
  });

  it("requires a directory when enabled", () => {
    expect(() => new SchemaCache({ enabled: true, directory: null })).toThrow(SchemaCacheError);
    expect(new SchemaCache({ enabled: false, directory: null }).schemaPath(ENDPOINT, "1")).toBeNull();
  });

  it("round-trips SDL and treats missing or empty files as misses", async () => {
    const path = join(directory, SchemaCache.fileName(ENDPOINT, "1.0.0"));

    expect(await cache.read(path)).toBeNull();

    await cache.write(path, "type Query { me: String }");
    expect(await cache.read(path)).toBe("type Query { me: String }");

    await writeFile(path, "");
    expect(await cache.read(path)).toBeNull();
  });

  it("treats a cache directory that does not exist yet as empty", async () => {
    const missing = new SchemaCache({ enabled: true, directory: join(directory, "not-created") });
    const path = missing.schemaPath(ENDPOINT, "1.0.0");

    expect(path).not.toBeNull();
    expect(await missing.read(path ?? "")).toBeNull();
    expect(await missing.purgeAll()).toBe(0);
    expect(await missing.purgeHost(ENDPOINT)).toBe(0);
  });

  it("purges only the files of one host", async () => {
    await writeFile(join(directory, "localhost_4000__1.0.0.graphql"), "a");
    await writeFile(join(directory, "localhost_4000__1.1.0.graphql"), "b");
    await writeFile(join(directory, "localhost_40001__1.0.0.graphql"), "c");
    await writeFile(join(directory, "notes.txt"), "d");

    expect(await cache.purgeHost(ENDPOINT)).toBe(2);
    expect((await readdir(directory)).sort()).toEqual(["localhost_40001__1.0.0.graphql", "notes.txt"]);
  });

  it("purges every cached schema", async () => {
    await writeFile(join(directory, "localhost_4000__1.0.0.graphql"), "a");
    await writeFile(join(directory, "other.test__2.graphql"), "b");

    expect(await cache.purgeAll()).toBe(2);
    expect(await readdir(directory)).toEqual([]);
  });

  it("serializes work under the directory lock", async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstBlocked = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = cache.withLock(async () => {
      order.push("first:start");
      await firstBlocked;
      order.push("first:end");
    });
    const second = new SchemaCache({ enabled: true, directory }).withLock(async () => {
      order.push("second");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(["first:start"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });
});
