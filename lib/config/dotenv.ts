/* eslint-disable no-restricted-properties */
import fs from "node:fs";
import path from "node:path";
import { parse } from "dotenv";

export type DotenvLoadOptions = {
  /** Overwrite keys already present in the environment. Off by default. */
  overwrite?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

// Comments, quotes and `export` prefixes follow dotenv's rules.
export function parseDotEnv(raw: string): Record<string, string> {
  return parse(raw);
}

/** Returns the keys it set. */
export function loadDotEnvFileIfPresent(filename: string, opts: DotenvLoadOptions = {}): string[] {
  const env = opts.env ?? process.env;
  const filePath = path.join(opts.cwd ?? process.cwd(), filename);
  if (!fs.existsSync(filePath)) return [];

  const loaded: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(fs.readFileSync(filePath, "utf8")))) {
    if (env[key] !== undefined && !opts.overwrite) continue;
    env[key] = value;
    loaded.push(key);
  }
  return loaded;
}
