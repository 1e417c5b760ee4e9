import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  loadConfig,
  validateConfig,
  resolvePageStoreCapacity,
  resolvePageIdParam,
  resolveContentType,
} from "./config.js";
import { ConfigurationError } from "../infra/errors.js";

// ---------------------------------------------------------------------------
// Mock node:fs
// ---------------------------------------------------------------------------

vi.mock("node:fs", () => ({
  existsSync: vi.fn(() => false),
  readFileSync: vi.fn(() => ""),
}));

const { existsSync, readFileSync } = await import("node:fs");
const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

beforeEach(() => {
  vi.clearAllMocks();
  mockExistsSync.mockReturnValue(false);
});

function withConfigFile(filename: string, content: string): void {
  mockExistsSync.mockImplementation((p) => String(p).endsWith(filename));
  mockReadFileSync.mockReturnValue(content);
}

// ---------------------------------------------------------------------------
// Resolvers
// ---------------------------------------------------------------------------

describe("resolvePageStoreCapacity", () => {
  it("returns 10 as default", () => {
    expect(resolvePageStoreCapacity({})).toBe(10);
  });

  it("returns custom capacity from config", () => {
    expect(resolvePageStoreCapacity({ pageStore: { capacity: 50 } })).toBe(50);
  });
});

describe("resolvePageIdParam", () => {
  it("returns page_id as default", () => {
    expect(resolvePageIdParam({})).toBe("page_id");
  });

  it("returns custom parameter from config", () => {
    expect(resolvePageIdParam({ session: { pageIdParam: "p" } })).toBe("p");
  });
});

describe("resolveContentType", () => {
  it("returns text/html as default", () => {
    expect(resolveContentType({})).toBe("text/html");
  });

  it("returns custom content type from config", () => {
    expect(resolveContentType({ render: { contentType: "application/xhtml+xml" } })).toBe(
      "application/xhtml+xml",
    );
  });
});

// ---------------------------------------------------------------------------
// validateConfig
// ---------------------------------------------------------------------------

describe("validateConfig", () => {
  it("treats null as empty config", () => {
    expect(validateConfig(null)).toEqual({});
  });

  it("rejects arrays", () => {
    expect(() => validateConfig([1, 2])).toThrow(ConfigurationError);
  });

  it("reports the offending path", () => {
    expect(() => validateConfig({ pageStore: { capacity: 0 } })).toThrow(
      "Invalid config: pageStore.capacity",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => validateConfig({ web: { port: 3000 } })).toThrow("Invalid config");
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

describe("loadConfig", () => {
  it("returns empty config when no file exists", () => {
    expect(loadConfig("/test")).toEqual({});
  });

  it("parses valid YAML config", () => {
    withConfigFile("sprig.config.yaml", "pageStore:\n  capacity: 25\n");
    expect(loadConfig("/test")).toEqual({ pageStore: { capacity: 25 } });
  });

  it("parses valid JSON config", () => {
    withConfigFile("sprig.config.json", '{"session":{"pageIdParam":"pid"}}');
    expect(loadConfig("/test").session?.pageIdParam).toBe("pid");
  });

  it("throws on invalid JSON", () => {
    withConfigFile("sprig.config.json", "{invalid json}");
    expect(() => loadConfig("/test")).toThrow("Failed to parse");
  });

  it("throws on schema violations", () => {
    withConfigFile("sprig.config.json", '{"pageStore":"big"}');
    expect(() => loadConfig("/test")).toThrow("Invalid config: pageStore");
  });

  it("returns empty documents as empty config", () => {
    withConfigFile("sprig.config.yaml", "---\n");
    expect(loadConfig("/test")).toEqual({});
  });

  it("checks YAML first, then YML, then JSON", () => {
    loadConfig("/test");
    const calls = mockExistsSync.mock.calls.map((c) => String(c[0]));
    expect(calls).toHaveLength(3);
    expect(calls[0]).toContain("sprig.config.yaml");
    expect(calls[1]).toContain("sprig.config.yml");
    expect(calls[2]).toContain("sprig.config.json");
  });

  it("throws on read error", () => {
    mockExistsSync.mockImplementation((p) => String(p).endsWith("sprig.config.yaml"));
    mockReadFileSync.mockImplementation(() => {
      throw new Error("EACCES permission denied");
    });
    expect(() => loadConfig("/test")).toThrow("Failed to read");
  });
});
