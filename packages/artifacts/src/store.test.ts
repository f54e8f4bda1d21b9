import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { MemoryArtifactStore } from "./memory-store.js";
import { FileArtifactStore } from "./file-store.js";
import { normalizeArtifactPath } from "./paths.js";
import type { ArtifactStore } from "./types.js";

describe("normalizeArtifactPath", () => {
  it("strips leading ./ and duplicate slashes", () => {
    expect(normalizeArtifactPath("./katana//deployments.json")).toBe("katana/deployments.json");
  });

  it("converts backslashes", () => {
    expect(normalizeArtifactPath("katana\\declarations.json")).toBe("katana/declarations.json");
  });

  it("rejects absolute paths", () => {
    expect(() => normalizeArtifactPath("/etc/passwd")).toThrow("must be relative");
  });

  it("rejects paths escaping the root", () => {
    expect(() => normalizeArtifactPath("../outside.json")).toThrow("escapes the store");
    expect(() => normalizeArtifactPath("a/../../b")).toThrow("escapes the store");
  });

  it("rejects empty paths", () => {
    expect(() => normalizeArtifactPath("  ")).toThrow("empty");
  });
});

function storeContract(name: string, create: () => ArtifactStore): void {
  describe(name, () => {
    let store: ArtifactStore;

    beforeEach(() => {
      store = create();
    });

    it("returns null for a missing artifact", async () => {
      expect(await store.read("katana/deployments.json")).toBeNull();
      expect(await store.exists("katana/deployments.json")).toBe(false);
    });

    it("writes and reads an artifact", async () => {
      await store.write("katana/deployments.json", "{}");
      expect(await store.read("katana/deployments.json")).toBe("{}");
      expect(await store.exists("katana/deployments.json")).toBe(true);
    });

    it("replaces existing content in full", async () => {
      await store.write(".env", "A=1\nB=2\n");
      await store.write(".env", "A=3\n");
      expect(await store.read(".env")).toBe("A=3\n");
    });

    it("removes artifacts", async () => {
      await store.write(".env", "A=1\n");
      expect(await store.remove(".env")).toBe(true);
      expect(await store.remove(".env")).toBe(false);
      expect(await store.read(".env")).toBeNull();
    });

    it("lists artifacts under a prefix", async () => {
      await store.write(".env", "");
      await store.write("katana/deployments.json", "{}");
      await store.write("katana/declarations.json", "{}");
      await store.write("katana-old/deployments.json", "{}");
      expect(await store.list("katana")).toEqual(["katana/declarations.json", "katana/deployments.json"]);
      expect(await store.list()).toHaveLength(4);
    });
  });
}

storeContract("MemoryArtifactStore", () => new MemoryArtifactStore());

describe("FileArtifactStore", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "stackgate-store-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  storeContract("contract", () => new FileArtifactStore(tmpDir));

  it("writes files beneath the root directory", async () => {
    const store = new FileArtifactStore(tmpDir);
    await store.write("katana/deployments.json", '{"a":1}');
    expect(readFileSync(join(tmpDir, "katana", "deployments.json"), "utf8")).toBe('{"a":1}');
  });

  it("leaves no temporary files behind", async () => {
    const store = new FileArtifactStore(tmpDir);
    await store.write(".env", "A=1\n");
    await store.write(".env", "A=2\n");
    expect(readdirSync(tmpDir)).toEqual([".env"]);
  });

  it("does not list in-flight temporary files", async () => {
    mkdirSync(join(tmpDir, "katana"));
    writeFileSync(join(tmpDir, "katana", "deployments.json.tmp.abcd1234"), "{");
    const store = new FileArtifactStore(tmpDir);
    expect(await store.list()).toEqual([]);
  });

  it("lists artifacts whose names merely contain .tmp.", async () => {
    const store = new FileArtifactStore(tmpDir);
    await store.write("build.tmp.json", "{}");
    await store.write("cache.tmp.abc", "x");
    writeFileSync(join(tmpDir, "build.tmp.json.tmp.0badf00d"), "{");
    expect(await store.list()).toEqual(["build.tmp.json", "cache.tmp.abc"]);
  });

  it("lists nothing when the root does not exist yet", async () => {
    const store = new FileArtifactStore(join(tmpDir, "not-created"));
    expect(await store.list()).toEqual([]);
  });
});
