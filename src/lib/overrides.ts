import { readFileSync } from "node:fs";

import { ConfigurationError } from "@/lib/capacity-model/errors";

const readJson = (path: string): unknown => {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([{ path, message: `Could not read assumption overrides: ${reason}` }]);
  }
};

/** Reads a JSON object of assumption overrides; no path means no overrides. */
export const loadOverrides = (path: string | undefined): object => {
  if (!path) {
    return {};
  }

  const parsed = readJson(path);

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError([
      { path, message: "Must contain a JSON object of assumption overrides." },
    ]);
  }

  return parsed;
};
