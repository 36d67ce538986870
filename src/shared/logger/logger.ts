import pino from "pino";

const defaultLevel = (): string => {
  if (process.env.NODE_ENV === "production") {
    return "info";
  }

  return process.env.NODE_ENV === "test" ? "silent" : "debug";
};

// stderr keeps CLI report output on stdout clean.
export const logger = pino(
  {
    name: "earnings-call-analyst",
    level: process.env.LOG_LEVEL ?? defaultLevel(),
  },
  pino.destination(2),
);
