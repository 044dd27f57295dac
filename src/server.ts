import { loadConfig } from "./config.js";
import { openEngine, type Engine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { logger } from "./logger.js";
import { loadSnapshot, saveSnapshot } from "./snapshotFile.js";

const config = loadConfig();

async function restore(): Promise<Engine> {
  try {
    return openEngine(await loadSnapshot(config.snapshotPath));
  } catch (e) {
    // a snapshot that cannot be decoded is never partially recovered
    logger.fatal({ err: e, snapshotPath: config.snapshotPath }, "could not load snapshot");
    process.exit(1);
  }
}

const engine = await restore();
const { server, port } = await startServer({ port: config.port, host: config.host, engine });
logger.info({ host: config.host, port }, "now serving");

let stopping = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, "shutting down");

  await new Promise<void>((resolve) => server.close(() => resolve()));
  const bytes = await engine.shutdown();
  await saveSnapshot(config.snapshotPath, bytes);
  logger.info({ snapshotPath: config.snapshotPath, bytes: bytes.length }, "wrote snapshot");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error({ err: e }, "could not write snapshot");
        process.exit(1);
      },
    );
  });
}
