import fs from "node:fs";
import path from "node:path";

const LOCAL_ENV_FILENAME = ".env.local";

const loadedEnvFiles = new Set<string>();

/**
 * Loads `.env.local` from the working directory, once per resolved path.
 * Variables that are already set win over the file.
 */
export function loadLocalEnv(cwd: string = process.cwd()): void {
  const envPath = path.resolve(cwd, LOCAL_ENV_FILENAME);
  if (loadedEnvFiles.has(envPath)) {
    return;
  }
  loadEnvFromFile(envPath, { override: false });
  loadedEnvFiles.add(envPath);
}

export function loadEnvFromFile(
  filePath: string,
  { override = false }: { override?: boolean } = {},
): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
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

export function parseEnvContent(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.split(/\r?\n/u)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=\s*(.*)$/u);
    if (!match) {
      continue;
    }
    const key = match[1];
    if (!key) {
      continue;
    }
    entries.set(key, unquoteEnvValue(match[2] ?? ""));
  }
  return entries;
}

function unquoteEnvValue(raw: string): string {
  const quote = raw.charAt(0);
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  const commentIndex = raw.indexOf(" #");
  return (commentIndex >= 0 ? raw.slice(0, commentIndex) : raw).trim();
}
