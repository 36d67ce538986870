import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

runCli(process.argv).catch((error) => {
  logger.error(
    { command: process.argv.slice(2), error: toErrorDetails(error) },
    "earnings-call-analyst failed",
  );
  process.exit(1);
});
