import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { StreamstatConfigSchema, type StreamstatConfig } from "./schema.js";

export function parseConfig(raw: string): StreamstatConfig {
  const parsed: unknown = YAML.parse(raw) ?? {};
  const result = StreamstatConfigSchema.safeParse(parsed);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      const pointer = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `  ${pointer}: ${issue.message}`;
    });
    throw new Error(`Invalid streamstat config:\n${messages.join("\n")}`);
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<StreamstatConfig> {
  const raw = await readFile(path, "utf8");
  return parseConfig(raw);
}

export async function loadConfigIfExists(path: string): Promise<StreamstatConfig> {
  try {
    return await loadConfig(path);
  } catch (error) {
    if (isNotFound(error)) {
      return StreamstatConfigSchema.parse({});
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
