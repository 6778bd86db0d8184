import { randomBytes } from "node:crypto";

const POSIX_SOCKET = "/tmp/mpvsocket";
const WINDOWS_PIPE = "\\\\.\\pipe\\mpvsocket";

let counter = 0;

/** Socket path mpv listens on when nothing else is configured. */
export function defaultSocketPath(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? WINDOWS_PIPE : POSIX_SOCKET;
}

/** `<default>-<n>`, unique within this process. */
export function incrementingSocketPath(): string {
  counter += 1;
  return `${defaultSocketPath()}-${counter}`;
}

/** `<default>-<16 hex chars>`. May collide, though it is unlikely. */
export function randomSocketPath(): string {
  return `${defaultSocketPath()}-${randomBytes(8).toString("hex")}`;
}

/** `<default>-<pid>-<n>`, unique across processes on one machine. */
export function incrementingPidSocketPath(): string {
  counter += 1;
  return `${defaultSocketPath()}-${process.pid}-${counter}`;
}
