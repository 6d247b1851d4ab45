import { readFile } from "node:fs/promises";
import ora, { type Ora } from "ora";

/** ora switches a terminal stdin to raw mode, so stdin reads run without a spinner. */
export function inputSpinner(files: readonly string[]): Ora | null {
  return files.length > 0 ? ora("Reading input").start() : null;
}

export async function readInputs(files: readonly string[]): Promise<string> {
  if (files.length === 0) {
    return readStdin();
  }
  const contents = await Promise.all(files.map((file) => readFile(file, "utf8")));
  return contents.join("\n");
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}
