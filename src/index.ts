#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { CommandError, ConnectionError, EXIT, errorMessage, exit } from "./shared/errors.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  const code =
    error instanceof ConnectionError
      ? EXIT.CONNECT_FAILURE
      : error instanceof CommandError
        ? EXIT.COMMAND_FAILURE
        : errorMessage(error).startsWith("invalid")
          ? EXIT.INVALID_ARGS
          : EXIT.GENERIC_ERROR;
  exit(code);
});
