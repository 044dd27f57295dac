export interface Config {
  port: number;
  host: string;
  /** Snapshot read at startup and written at shutdown. */
  snapshotPath: string;
}

export const DEFAULT_PORT = 42069;
export const DEFAULT_SNAPSHOT_PATH = "./paper-engine-cache.pec";

/**
 * Gets an environment variable, falling back to `defaultValue` when it is unset or blank.
 */
export function envVar(env: Record<string, string | undefined>, key: string, defaultValue: string): string {
  const value = env[key];
  if (value === undefined || value.trim() === "") return defaultValue;
  return value;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const rawPort = envVar(env, "PORT", String(DEFAULT_PORT));
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: expected an integer between 0 and 65535 → ${rawPort}`);
  }

  return {
    port,
    host: envVar(env, "HOST", "127.0.0.1"),
    snapshotPath: envVar(env, "SNAPSHOT_PATH", DEFAULT_SNAPSHOT_PATH),
  };
}
