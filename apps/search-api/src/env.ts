import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { EnvSchema, type Env } from "./types/index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Load environment variables.
 * Service-local `.env` wins over the workspace root; variables already set are never overridden.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const candidates = [
    path.resolve(__dirname, "..", ".env"),
    path.resolve(process.cwd(), "apps", "search-api", ".env"),
    path.resolve(process.cwd(), ".env"),
    path.resolve(__dirname, "..", "..", "..", ".env"),
  ];

  if (source === process.env) {
    for (const p of Array.from(new Set(candidates))) {
      if (fs.existsSync(p)) {
        dotenv.config({ path: p, override: false });
      }
    }
  }

  return parseEnv(source);
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }

  return parsed.data;
}
