import { configGet, configSet, getConfigPath, getDataDir, isConfigKey, type ConfigKey } from "../../config.js";
import { printJson, type GlobalOptions } from "../utils.js";

function toKey(key: string): ConfigKey {
  if (!isConfigKey(key)) throw new Error(`invalid config key: ${key}`);
  return key;
}

export async function runConfigGet(key: string, opts: GlobalOptions): Promise<void> {
  printJson(await configGet(getDataDir(opts.dataDir), toKey(key)));
}

export async function runConfigSet(key: string, value: string, opts: GlobalOptions): Promise<void> {
  await configSet(getDataDir(opts.dataDir), toKey(key), value);
}

export function runConfigPath(opts: GlobalOptions): void {
  process.stdout.write(getConfigPath(getDataDir(opts.dataDir)) + "\n");
}
