import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import { DEFAULT_STYLE } from "./engines/shared.js";

export const RC_FILE = ".gemcommitrc";

export interface Config {
  style: string;
  commit: boolean;
  apiKey?: string;
}

export interface CliOptions {
  style?: string;
  commit?: boolean;
}

interface LoadContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type FileConfig = Partial<Config>;

function parseFileConfig(source: string, value: unknown): FileConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }

  const style: unknown = Reflect.get(value, "style");
  const commit: unknown = Reflect.get(value, "commit");
  const apiKey: unknown = Reflect.get(value, "apiKey");
  const config: FileConfig = {};

  if (style !== undefined) {
    if (typeof style !== "string") throw new ConfigError(`${source}: "style" must be a string`);
    config.style = style;
  }
  if (commit !== undefined) {
    if (typeof commit !== "boolean") throw new ConfigError(`${source}: "commit" must be a boolean`);
    config.commit = commit;
  }
  if (apiKey !== undefined) {
    if (typeof apiKey !== "string") throw new ConfigError(`${source}: "apiKey" must be a string`);
    config.apiKey = apiKey;
  }

  return config;
}

// Variables already in the environment win over .env, as with dotenv.config()
async function withDotenv(cwd: string, env: NodeJS.ProcessEnv): Promise<NodeJS.ProcessEnv> {
  const envPath = join(cwd, ".env");
  if (!existsSync(envPath)) return env;
  const parsed = dotenv.parse(await readFile(envPath, "utf-8"));
  return { ...parsed, ...env };
}

async function readJson(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${path}: ${reason}`);
  }
}

export async function loadConfig(
  cliOptions: CliOptions,
  { cwd = process.cwd(), env = process.env }: LoadContext = {}
): Promise<Config> {
  const defaults: Config = {
    style: DEFAULT_STYLE,
    commit: false,
  };

  let fileConfig: FileConfig = {};
  const configPath = join(cwd, RC_FILE);

  if (existsSync(configPath)) {
    fileConfig = parseFileConfig(RC_FILE, await readJson(configPath));
  }

  // package.json "gemcommit" field
  const pkgPath = join(cwd, "package.json");
  if (existsSync(pkgPath)) {
    const pkg = await readJson(pkgPath);
    const section: unknown =
      typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "gemcommit") : undefined;
    if (section !== undefined) {
      fileConfig = { ...fileConfig, ...parseFileConfig("package.json#gemcommit", section) };
    }
  }

  // Merge: defaults < file config < .env < env vars < CLI options
  const vars = await withDotenv(cwd, env);
  const envKey = vars.GEMINI_API_KEY || vars.GOOGLE_API_KEY;

  return {
    style: cliOptions.style || fileConfig.style || defaults.style,
    commit: cliOptions.commit ?? fileConfig.commit ?? defaults.commit,
    apiKey: envKey || fileConfig.apiKey,
  };
}

export function requireApiKey(config: Config): string {
  if (!config.apiKey) {
    throw new ConfigError(
      `GEMINI_API_KEY must be set in the environment or .env (or GOOGLE_API_KEY, or "apiKey" in ${RC_FILE})`
    );
  }
  return config.apiKey;
}
