import type { LoadFileMode, SeekFlag } from "../../client.js";
import { withClient, type GlobalOptions } from "../utils.js";

const LOAD_MODES: readonly LoadFileMode[] = ["replace", "append", "append-play"];
const SEEK_FLAGS: readonly SeekFlag[] = [
  "relative",
  "absolute",
  "exact",
  "keyframes",
  "relative-percent",
  "absolute-percent",
];

export function parseLoadMode(raw: string): LoadFileMode {
  const mode = LOAD_MODES.find((m) => m === raw);
  if (!mode) throw new Error(`invalid load mode: ${raw} (expected ${LOAD_MODES.join(", ")})`);
  return mode;
}

export function parseSeekFlags(raw: readonly string[]): SeekFlag[] {
  return raw.map((value) => {
    const flag = SEEK_FLAGS.find((f) => f === value);
    if (!flag) throw new Error(`invalid seek flag: ${value} (expected ${SEEK_FLAGS.join(", ")})`);
    return flag;
  });
}

export async function runPlay(opts: GlobalOptions): Promise<void> {
  await withClient(opts, (client) => client.play());
}

export async function runPause(opts: GlobalOptions): Promise<void> {
  await withClient(opts, (client) => client.pause());
}

export async function runSeek(position: string, flags: string[], opts: GlobalOptions): Promise<void> {
  const seconds = Number(position);
  if (!Number.isFinite(seconds)) throw new Error(`invalid position: ${position}`);
  const seekFlags = parseSeekFlags(flags);
  await withClient(opts, (client) => client.seek(seconds, seekFlags));
}

export async function runLoad(file: string, mode: string, opts: GlobalOptions): Promise<void> {
  const loadMode = parseLoadMode(mode);
  await withClient(opts, (client) => client.loadFile(file, loadMode));
}
