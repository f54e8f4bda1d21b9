import { describe, it, expect, beforeEach } from "vitest";
import { MemoryArtifactStore } from "./memory-store.js";
import { StructuredArtifactReader } from "./reader.js";

describe("StructuredArtifactReader", () => {
  let store: MemoryArtifactStore;
  let reader: StructuredArtifactReader;

  beforeEach(async () => {
    store = new MemoryArtifactStore();
    reader = new StructuredArtifactReader(store);
    await store.write("katana/deployments.json", JSON.stringify({ kakarot: { address: "0xABC" } }));
  });

  it("reads a nested field", async () => {
    expect(await reader.read("katana/deployments.json", ".kakarot.address")).toEqual({ ok: true, value: "0xABC" });
  });

  it("reads a field from pre-parsed steps", async () => {
    expect(await reader.read("katana/deployments.json", ["kakarot", "address"])).toEqual({ ok: true, value: "0xABC" });
  });

  it("yields null for a missing field instead of an error", async () => {
    expect(await reader.read("katana/deployments.json", ".deployer_account.address")).toEqual({ ok: true, value: null });
  });

  it("reports not-found for an absent artifact", async () => {
    const result = await reader.read("katana/declarations.json", ".account_contract");
    expect(result).toEqual({
      ok: false,
      error: "not-found",
      path: "katana/declarations.json",
      message: "Artifact not found: katana/declarations.json",
    });
  });

  it("reports parse-failure for malformed JSON", async () => {
    await store.write("katana/declarations.json", "{ not json");
    const result = await reader.read("katana/declarations.json", ".account_contract");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe("parse-failure");
      expect(result.path).toBe("katana/declarations.json");
    }
  });

  it("reports parse-failure when the store cannot read the path", async () => {
    const result = await reader.readDocument("../escape.json");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe("parse-failure");
    }
  });

  it("returns the whole document for an empty path", async () => {
    expect(await reader.readDocument("katana/deployments.json")).toEqual({
      ok: true,
      value: { kakarot: { address: "0xABC" } },
    });
  });
});
