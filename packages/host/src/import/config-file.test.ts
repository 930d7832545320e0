import { describe, it, expect, vi, beforeEach } from "vitest";
import { loadValidatorConfig } from "./config-file.js";

// ══════════════════════════════════════════════════════════════════════
// In-memory file system mock
// ══════════════════════════════════════════════════════════════════════

const mockFiles = new Map<string, string>();

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(async (path: string) => {
    const content = mockFiles.get(path);
    if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
    return content;
  }),
}));

// ══════════════════════════════════════════════════════════════════════
// Tests
// ══════════════════════════════════════════════════════════════════════

describe("loadValidatorConfig", () => {
  beforeEach(() => {
    mockFiles.clear();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("rejects a non-.json extension", async () => {
    const result = await loadValidatorConfig("/cfg/validator.yaml");

    expect(result).toEqual({ ok: false, error: "Config file must have a .json extension." });
  });

  it("fills in defaults for an empty object", async () => {
    mockFiles.set("/cfg/validator.json", "{}");

    const result = await loadValidatorConfig("/cfg/validator.json");

    expect(result).toEqual({ ok: true, config: { playerNumbers: [1, 2], maxCards: 52 } });
  });

  it("keeps explicit values", async () => {
    mockFiles.set("/cfg/validator.json", JSON.stringify({ playerNumbers: [1, 2, 3], maxCards: 104 }));

    const result = await loadValidatorConfig("/cfg/validator.json");

    expect(result).toEqual({ ok: true, config: { playerNumbers: [1, 2, 3], maxCards: 104 } });
  });

  it("reports a missing file", async () => {
    const result = await loadValidatorConfig("/cfg/missing.json");

    expect(result).toEqual({
      ok: false,
      error: "Failed to read file: ENOENT: no such file, open '/cfg/missing.json'",
    });
  });

  it("reports invalid JSON", async () => {
    mockFiles.set("/cfg/validator.json", "{ playerNumbers: [1, 2] }");

    const result = await loadValidatorConfig("/cfg/validator.json");

    expect(result).toEqual({ ok: false, error: "File is not valid JSON." });
  });

  it("lists schema issues by path", async () => {
    mockFiles.set("/cfg/validator.json", JSON.stringify({ playerNumbers: [1, 1] }));

    const result = await loadValidatorConfig("/cfg/validator.json");

    expect(result).toEqual({
      ok: false,
      error: "Validation failed: playerNumbers: playerNumbers must not repeat a player",
    });
  });
});
