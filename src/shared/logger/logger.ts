import pino from "pino";

const defaultLevel = (): string => {
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "rsi-monitor",
  level: process.env.LOG_LEVEL ?? defaultLevel(),
});
