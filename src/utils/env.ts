import fs from "node:fs";
import path from "node:path";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Loads `.env` from `cwd` into `process.env`.
 *
 * - Does not override already-set `process.env` values unless `override` is set.
 * - Missing file is silently ignored.
 */
export function loadDotEnv({
  cwd = process.cwd(),
  fileName = ".env",
  override = false,
}: { cwd?: string; fileName?: string; override?: boolean } = {}): void {
  loadEnvFromFile(path.join(cwd, fileName), { override });
}

export function loadEnvFromFile(
  filePath: string,
  { override = false }: { override?: boolean } = {},
): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return;
    }
    throw error;
  }

  for (const [key, value] of parseEnvContent(content)) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

export function parseEnvContent(content: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u);
  if (!match) {
    return null;
  }
  const key = match[1];
  if (!key) {
    return null;
  }
  let value = match[2] ?? "";

  const quote = value.charAt(0);
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    return [key, value.slice(1, -1)];
  }
  const commentIndex = value.indexOf(" #");
  if (commentIndex >= 0) {
    value = value.slice(0, commentIndex);
  }
  return [key, value.trim()];
}

/** Case-insensitive lookup; blank values count as unset. */
export function readEnv(env: EnvSource, name: string): string | undefined {
  const exact = env[name];
  if (exact !== undefined) {
    return exact.trim() || undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(env)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value.trim() || undefined;
    }
  }
  return undefined;
}

export function readEnvInteger(env: EnvSource, name: string): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

export function readEnvJson(env: EnvSource, name: string): unknown {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${name} must be valid JSON: ${message}`);
  }
}
