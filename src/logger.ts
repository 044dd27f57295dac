import pino from "pino";

const logLevel = process.env.LOG_LEVEL || "info";

// When running locally log in a human-readable format and not JSON
const transport =
  process.env.LOG_PRETTY === "true"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
        },
      }
    : undefined;

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: logLevel,
  base: { service: "termdex" },
  transport,
});
