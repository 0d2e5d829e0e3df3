import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterAll, describe, expect, it } from "vitest";

import { ConfigurationError } from "@/lib/capacity-model/errors";
import { loadOverrides } from "@/lib/overrides";

const workDir = mkdtempSync(join(tmpdir(), "rcm-overrides-"));

const writeOverrides = (name: string, contents: string): string => {
  const path = join(workDir, name);
  writeFileSync(path, contents, "utf8");
  return path;
};

const captureError = (path: string): ConfigurationError => {
  try {
    loadOverrides(path);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }

  throw new Error("expected the overrides to be rejected");
};

afterAll(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("loadOverrides", () => {
  it("returns no overrides without a path", () => {
    expect(loadOverrides(undefined)).toEqual({});
  });

  it("reads a JSON object of overrides", () => {
    const path = writeOverrides("ratio.json", '{ "managerToAnalystRatio": 8 }');

    expect(loadOverrides(path)).toEqual({ managerToAnalystRatio: 8 });
  });

  it("reports a missing file against its path", () => {
    const path = join(workDir, "missing.json");
    const error = captureError(path);

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].path).toBe(path);
    expect(error.issues[0].message).toMatch(/^Could not read assumption overrides: ENOENT/);
  });

  it("reports malformed JSON against its path", () => {
    const path = writeOverrides("broken.json", "{ managerToAnalystRatio: ");
    const error = captureError(path);

    expect(error.issues[0].path).toBe(path);
    expect(error.issues[0].message).toMatch(/^Could not read assumption overrides: /);
  });

  it("rejects JSON that is not an object", () => {
    const path = writeOverrides("list.json", "[8]");

    expect(captureError(path).issues).toEqual([
      { path, message: "Must contain a JSON object of assumption overrides." },
    ]);
  });
});
