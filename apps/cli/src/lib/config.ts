import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

/**
 * Default limits, applied when the matching flag is not given.
 * 0 means unlimited for every limit.
 */
export const ConfigSchema = z.object({
  files: z.number().int().min(0),
  dirs: z.number().int().min(0),
  level: z.number().int().min(0),
  color: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigKey = keyof Config;

export const CONFIG_KEYS: readonly ConfigKey[] = ["files", "dirs", "level", "color"];

export const DEFAULT_CONFIG: Config = {
  files: 5,
  dirs: 1,
  level: 0,
  color: true,
};

export function getDirshapeDir(): string {
  return process.env.DIRSHAPE_HOME || path.join(os.homedir(), ".dirshape");
}

export function getConfigPath(): string {
  return path.join(getDirshapeDir(), "config.json");
}

export function ensureDirshapeDir(): void {
  const dir = getDirshapeDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load the config file merged over defaults.
 *
 * A missing file, unparseable JSON, or a file that fails validation all
 * yield the defaults.
 */
export function loadConfig(): Config {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    const content = fs.readFileSync(configPath, "utf-8");
    const loaded = ConfigSchema.partial().safeParse(JSON.parse(content));
    if (!loaded.success) {
      return { ...DEFAULT_CONFIG };
    }
    return { ...DEFAULT_CONFIG, ...loaded.data };
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

export function saveConfig(config: Config): void {
  ensureDirshapeDir();
  fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

const LimitValue = z
  .string()
  .trim()
  .min(1, "must be a number")
  .pipe(
    z.coerce
      .number({ invalid_type_error: "must be a number" })
      .int("must be an integer")
      .min(0, "must be >= 0")
  );

const BooleanValue = z.enum(["true", "false"], {
  errorMap: () => ({ message: 'must be "true" or "false"' }),
});

export function setConfigValue(config: Config, key: string, value: string): void {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}`);
  }

  if (key === "color") {
    const parsed = BooleanValue.safeParse(value);
    if (!parsed.success) {
      throw new Error(`Invalid value for ${key}: ${parsed.error.issues[0]?.message}`);
    }
    config.color = parsed.data === "true";
    return;
  }

  const parsed = LimitValue.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid value for ${key}: ${parsed.error.issues[0]?.message}`);
  }
  config[key] = parsed.data;
}

export function getConfigValue(config: Config, key: string): string | undefined {
  if (!isConfigKey(key)) {
    return undefined;
  }
  return String(config[key]);
}
