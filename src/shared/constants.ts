export const DEFAULT_DIAL_TIMEOUT_MS = 5_000;
export const DEFAULT_EVENT_BUFFER_SIZE = 64;
export const DEFAULT_CONN_MAX_RETRIES = 5;
export const DEFAULT_CONN_RETRY_DELAY_MS = 100;

export const SUCCESS = "success";

export function defaultMpvPath(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "mpv.exe" : "mpv";
}
