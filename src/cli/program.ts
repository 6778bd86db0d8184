import { Command } from "commander";
import chalk from "chalk";
import { runCommand } from "./commands/command.js";
import { runConfigGet, runConfigPath, runConfigSet } from "./commands/config.js";
import { runLaunch } from "./commands/launch.js";
import { runEvents, runObserve } from "./commands/observe.js";
import { runLoad, runPause, runPlay, runSeek } from "./commands/playback.js";
import { runGet, runSet } from "./commands/property.js";
import { getPackageJsonVersion, type GlobalOptions } from "./utils.js";

function globals(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("mpvctl")
    .description(`${chalk.bold("mpvctl")}: drive a running mpv over its JSON IPC socket`)
    .version(getPackageJsonVersion())
    .option("--socket <path>", "mpv IPC socket or named pipe")
    .option("--timeout <ms>", "Connection timeout in milliseconds")
    .option("--data-dir <path>", "Config directory (default ~/.mpvctl)")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level")
    .option("--log-format <format>", "Log format: text, json or plain", "text");

  program
    .command("command")
    .description("Send a raw input command and print its result")
    .argument("<name>", "Command name, e.g. loadfile")
    .argument("[args...]", "Arguments (JSON or plain strings)")
    .action((name: string, args: string[], _opts: unknown, cmd: Command) =>
      runCommand(name, args, globals(cmd))
    );

  program
    .command("get")
    .description("Print a property value")
    .argument("<property>")
    .action((property: string, _opts: unknown, cmd: Command) => runGet(property, globals(cmd)));

  program
    .command("set")
    .description("Set a property")
    .argument("<property>")
    .argument("<value>", "JSON or plain string")
    .action((property: string, value: string, _opts: unknown, cmd: Command) =>
      runSet(property, value, globals(cmd))
    );

  program
    .command("play")
    .description("Resume playback")
    .action((_opts: unknown, cmd: Command) => runPlay(globals(cmd)));

  program
    .command("pause")
    .description("Pause playback")
    .action((_opts: unknown, cmd: Command) => runPause(globals(cmd)));

  program
    .command("seek")
    .description("Seek to or by a position in seconds")
    .argument("<position>")
    .argument("[flags...]", "relative, absolute, exact, keyframes, relative-percent, absolute-percent")
    .action((position: string, flags: string[], _opts: unknown, cmd: Command) =>
      runSeek(position, flags, globals(cmd))
    );

  program
    .command("load")
    .description("Load a file or URL")
    .argument("<file>")
    .option("--mode <mode>", "replace, append or append-play", "replace")
    .action((file: string, opts: { mode: string }, cmd: Command) =>
      runLoad(file, opts.mode, globals(cmd))
    );

  program
    .command("observe")
    .description("Print every change of a property until interrupted")
    .argument("<property>")
    .action((property: string, _opts: unknown, cmd: Command) => runObserve(property, globals(cmd)));

  program
    .command("events")
    .description("Print every event mpv sends until interrupted")
    .action((_opts: unknown, cmd: Command) => runEvents(globals(cmd)));

  program
    .command("launch")
    .description("Start mpv, play a file and wait until it finishes")
    .argument("<file>")
    .argument("[mpvArgs...]", "Extra arguments passed to mpv")
    .action((file: string, mpvArgs: string[], _opts: unknown, cmd: Command) =>
      runLaunch(file, mpvArgs, globals(cmd))
    );

  const config = program.command("config").description("Read or change the config file");

  config
    .command("get")
    .argument("<key>", "socket.path, mpv.path, dial.timeout or log.level")
    .action((key: string, _opts: unknown, cmd: Command) => runConfigGet(key, globals(cmd)));

  config
    .command("set")
    .argument("<key>")
    .argument("<value>")
    .action((key: string, value: string, _opts: unknown, cmd: Command) =>
      runConfigSet(key, value, globals(cmd))
    );

  config
    .command("path")
    .description("Print the config file location")
    .action((_opts: unknown, cmd: Command) => runConfigPath(globals(cmd)));

  return program;
}
