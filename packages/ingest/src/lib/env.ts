import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";

export const parseDotEnv = (contents: string) => {
  const values: Record<string, string> = {};
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) {
      continue;
    }
    const key = trimmed.slice(0, eqIdx).trim();
    values[key] = trimmed.slice(eqIdx + 1).trim().replace(/^['"]|['"]$/g, "");
  }
  return values;
};

// Walks up from the working directory to the first .env; variables already set win.
export const loadDotEnv = (startDir = process.cwd()) => {
  let currentDir = startDir;
  for (let i = 0; i < 6; i += 1) {
    const envPath = resolve(currentDir, ".env");
    if (existsSync(envPath)) {
      const values = parseDotEnv(readFileSync(envPath, "utf-8"));
      for (const [key, value] of Object.entries(values)) {
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
      return envPath;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }
  return null;
};
