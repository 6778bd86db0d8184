import { printJson, waitForInterrupt, withClient, type GlobalOptions } from "../utils.js";

/** Print every change of `property` as one JSON line until interrupted. */
export async function runObserve(property: string, opts: GlobalOptions): Promise<void> {
  await withClient(opts, async (client) => {
    const stop = await client.observeProperty(property, (value) => printJson(value));
    await waitForInterrupt(client.closed);
    if (client.state === "open") await stop();
  });
}

/** Print every event mpv sends as one JSON line until interrupted. */
export async function runEvents(opts: GlobalOptions): Promise<void> {
  await withClient(opts, async (client) => {
    const remove = client.addEventHandlerSync((event) => printJson(event.fields));
    await waitForInterrupt(client.closed);
    remove();
  });
}
