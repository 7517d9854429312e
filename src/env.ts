import fs from "fs";
import path from "path";

export type EnvEntry = { key: string; value: string };

export function parseEnvLine(line: string): EnvEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;

  const normalized = trimmed.startsWith("export ")
    ? trimmed.slice("export ".length)
    : trimmed;
  const eqIndex = normalized.indexOf("=");
  if (eqIndex <= 0) return null;

  const key = normalized.slice(0, eqIndex).trim();
  if (!key) return null;

  let value = normalized.slice(eqIndex + 1).trim();
  if (
    (value.startsWith("\"") && value.endsWith("\"")) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }
  if (value.includes("\\n")) {
    value = value.replace(/\\n/g, "\n");
  }
  return { key, value };
}

/**
 * Copies entries of a dotenv file into `target`. Variables already present
 * win over the file.
 */
export function loadEnvFile(filePath: string, target: NodeJS.ProcessEnv = process.env): number {
  if (!fs.existsSync(filePath)) return 0;

  let applied = 0;
  for (const line of fs.readFileSync(filePath, "utf-8").split(/\r?\n/)) {
    const entry = parseEnvLine(line);
    if (!entry) continue;
    if (Object.prototype.hasOwnProperty.call(target, entry.key)) continue;
    target[entry.key] = entry.value;
    applied += 1;
  }
  return applied;
}

loadEnvFile(path.resolve(process.cwd(), ".env"));
