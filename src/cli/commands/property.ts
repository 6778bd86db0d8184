import { parseValue, printJson, withClient, type GlobalOptions } from "../utils.js";

export async function runGet(property: string, opts: GlobalOptions): Promise<void> {
  const value = await withClient(opts, (client) => client.getProperty(property));
  printJson(value);
}

export async function runSet(property: string, rawValue: string, opts: GlobalOptions): Promise<void> {
  await withClient(opts, (client) => client.setProperty(property, parseValue(rawValue)));
}
