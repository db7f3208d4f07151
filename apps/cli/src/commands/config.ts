import type { Command } from "commander";
import {
  CONFIG_KEYS,
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../lib/config";
import { createFormatter } from "../lib/output";

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Default limit management");

  config
    .command("list")
    .description("Show the effective configuration")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const current = loadConfig();

      if (formatter.format === "text") {
        formatter.printKeyValue(CONFIG_KEYS.map((key) => [key, current[key]]));
        return;
      }
      formatter.output(current);
    });

  config
    .command("get <key>")
    .description("Show one configuration value")
    .action((key: string) => {
      const formatter = createFormatter(program.opts());
      const value = getConfigValue(loadConfig(), key);
      if (value === undefined) {
        throw new Error(`Unknown config key: ${key}`);
      }
      formatter.output({ [key]: value }, () => value);
    });

  config
    .command("set <key> <value>")
    .description(`Set a default (${CONFIG_KEYS.join(", ")})`)
    .action((key: string, value: string) => {
      const formatter = createFormatter(program.opts());
      const current = loadConfig();
      setConfigValue(current, key, value);
      saveConfig(current);
      formatter.success(`Set ${key} = ${getConfigValue(current, key)}`);
    });

  config
    .command("path")
    .description("Show config file path")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const configPath = getConfigPath();
      formatter.output({ path: configPath }, () => configPath);
    });
}
