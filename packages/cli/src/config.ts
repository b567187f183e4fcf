/**
 * pilkit configuration loader.
 * Precedence: ./.pilkit.json > ~/.pilkit/config.json > defaults
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { DEFAULT_MAX_PASSES_PER_ROW } from "@pilkit/witgen";

export const configSchema = z.object({
  version: z.literal(1, { errorMap: () => ({ message: "Config 'version' must be 1" }) }),
  unknownCells: z.enum(["fail", "zero"]).default("fail"),
  maxPassesPerRow: z.number().int().positive().default(DEFAULT_MAX_PASSES_PER_ROW),
}).strict();

export type Config = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export class ConfigError extends Error {
  path: string;

  constructor(filePath: string, message: string) {
    super(`Invalid config ${filePath}: ${message}`);
    this.name = "ConfigError";
    this.path = filePath;
  }
}

const DEFAULT_CONFIG: Config = {
  version: 1,
  unknownCells: "fail",
  maxPassesPerRow: DEFAULT_MAX_PASSES_PER_ROW,
};

/** Throws `ConfigError` when a config file exists but does not validate. */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".pilkit.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".pilkit", "config.json");

  const projectConfig = loadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = loadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

function loadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(filePath, e instanceof Error ? e.message : String(e));
  }
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    throw new ConfigError(filePath, issues.join("; "));
  }
  return parsed.data;
}
