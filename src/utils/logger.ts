import pino from "pino";

const redactionPaths = [
  "*.headers.authorization",
  "*.authorization",
  "*.password",
  "*.token",
  "NEO4J_PASSWORD",
  "INFLUX_TOKEN"
];

const pretty =
  process.env.NODE_ENV !== "production" && process.stdout.isTTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  redact: { paths: redactionPaths, censor: "[REDACTED]" },
  transport: pretty
});
