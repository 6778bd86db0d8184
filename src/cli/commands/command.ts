import { parseValue, printJson, withClient, type GlobalOptions } from "../utils.js";

export async function runCommand(name: string, rawArgs: string[], opts: GlobalOptions): Promise<void> {
  const data = await withClient(opts, (client) => client.command(name, rawArgs.map(parseValue)));
  printJson(data);
}
