import { MpvProcess } from "../../process.js";
import { randomSocketPath } from "../../shared/ids.js";
import { setup, waitForInterrupt, type GlobalOptions } from "../utils.js";

/**
 * Start a private mpv, play `file`, and return once playback is over
 * (mpv goes idle), mpv exits, or the user interrupts.
 */
export async function runLaunch(file: string, mpvArgs: string[], opts: GlobalOptions): Promise<void> {
  const settings = await setup(opts);
  const mpv = new MpvProcess({
    path: settings.mpvPath,
    args: ["--force-window", ...mpvArgs],
    socketPath: opts.socket ?? randomSocketPath(),
    stdio: ["ignore", "ignore", "inherit"],
    client: { dialTimeoutMs: settings.dialTimeoutMs },
  });

  try {
    const client = await mpv.openClient();
    let finished: () => void = () => undefined;
    const idle = new Promise<void>((resolve) => {
      finished = resolve;
    });
    let started = false;
    await client.observeProperty("idle-active", (value) => {
      // mpv reports idle once before the file starts playing.
      if (value === false) started = true;
      else if (value === true && started) finished();
    });
    await client.loadFile(file, "replace");
    await client.play();
    await waitForInterrupt(Promise.race([idle, mpv.wait()]));
  } finally {
    await mpv.close();
  }
}
