/** Environment variables read by the CLI and `openClient`. */
export const MPVCTL_ENV = {
  SOCKET: "MPVCTL_SOCKET",
  MPV_PATH: "MPVCTL_MPV_PATH",
  LOG_LEVEL: "MPVCTL_LOG_LEVEL",
  DIAL_TIMEOUT: "MPVCTL_DIAL_TIMEOUT",
} as const;

export function getEnv(key: keyof typeof MPVCTL_ENV): string | undefined {
  const value = process.env[MPVCTL_ENV[key]];
  return value === "" ? undefined : value;
}
