import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

function stripSurroundingQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const start = trimmed[0];
    const end = trimmed[trimmed.length - 1];
    if ((start === "'" && end === "'") || (start === '"' && end === '"')) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

export function parseEnvLine(line: string): { key: string; value: string } | undefined {
  let trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return undefined;
  }
  if (trimmed.startsWith("export ")) {
    trimmed = trimmed.slice("export ".length).trim();
  }

  const equalIndex = trimmed.indexOf("=");
  if (equalIndex <= 0) {
    return undefined;
  }

  const key = trimmed.slice(0, equalIndex).trim();
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/u.test(key)) {
    return undefined;
  }
  return { key, value: stripSurroundingQuotes(trimmed.slice(equalIndex + 1)) };
}

/** Returns the keys it filled in. Keys already present in `env` are left alone, even when empty. */
export function loadEnvFile(path: string, env: NodeJS.ProcessEnv = process.env): string[] {
  if (!existsSync(path)) {
    return [];
  }
  const applied: string[] = [];
  const content = readFileSync(path, "utf-8");
  for (const line of content.split(/\r?\n/)) {
    const parsed = parseEnvLine(line);
    if (!parsed) {
      continue;
    }
    if (env[parsed.key] === undefined) {
      env[parsed.key] = parsed.value;
      applied.push(parsed.key);
    }
  }
  return applied;
}

export function bootstrapEnv(options?: { root?: string; env?: NodeJS.ProcessEnv }): void {
  const root = options?.root ?? process.cwd();
  const env = options?.env ?? process.env;
  // Priority: real environment > .env.local > .env.example
  loadEnvFile(resolve(root, ".env.local"), env);
  loadEnvFile(resolve(root, ".env.example"), env);
}
