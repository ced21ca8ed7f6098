// ---------------------------------------------------------------------------
// Module arguments – load the invocation's argument document
// ---------------------------------------------------------------------------
// Accepts JSON or YAML, either wrapped as { ANSIBLE_MODULE_ARGS: {...} } or as
// a flat mapping of options.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";

export const WRAPPED_ARGS_KEY = "ANSIBLE_MODULE_ARGS";

export class ModuleArgsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModuleArgsError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseModuleArgs(text: string): Record<string, unknown> {
  let doc: unknown;
  try {
    // YAML 1.2 is a superset of JSON, so one parser covers both.
    doc = parseYaml(text);
  } catch (err) {
    throw new ModuleArgsError(
      `could not parse module arguments: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  if (doc === null || doc === undefined) {
    return {};
  }
  if (!isRecord(doc)) {
    throw new ModuleArgsError("module arguments must be a mapping of option names to values");
  }

  const wrapped = doc[WRAPPED_ARGS_KEY];
  if (wrapped === undefined) {
    return doc;
  }
  if (!isRecord(wrapped)) {
    throw new ModuleArgsError(`${WRAPPED_ARGS_KEY} must be a mapping of option names to values`);
  }
  return wrapped;
}

export type ArgsSourceDeps = {
  readFile?: (filePath: string) => Promise<string>;
  readStdin?: () => Promise<string>;
};

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function readUtf8File(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf-8");
}

/** `source` is a file path, or "-" for stdin. */
export async function loadModuleArgs(
  source: string,
  deps: ArgsSourceDeps = {},
): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text =
      source === "-"
        ? await (deps.readStdin ?? readAllStdin)()
        : await (deps.readFile ?? readUtf8File)(source);
  } catch (err) {
    throw new ModuleArgsError(
      `could not read module arguments from ${source === "-" ? "stdin" : source}: ${
        err instanceof Error ? err.message : String(err)
      }`,
      { cause: err },
    );
  }
  return parseModuleArgs(text);
}
