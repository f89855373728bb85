import { Logger, parseLogLevel } from "@file-serve/utils";
import { defaultFileServerConfig } from "@file-serve/webserver";
import { APP_NAME, APP_VERSION } from "./app-info";
import { runFileServer } from "./run";

/**
 * Handle CLI arguments and run the server
 */
export async function handleCLI(
  args: string[] = process.argv.slice(2),
): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    showHelp();
    return;
  }

  if (args.includes("--version") || args.includes("-v")) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    return;
  }

  // stdout is reserved for the startup line
  const logger = Logger.getInstance({ useStderr: true });
  logger.setLevel(parseLogLevel(process.env["LOG_LEVEL"]));

  if (args.length > 0) {
    logger.warn(`Ignoring unknown arguments: ${args.join(" ")}`);
  }

  process.on("uncaughtException", (error) => {
    logger.error(`❌ ${APP_NAME} crashed:`, error);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.error(`❌ ${APP_NAME} unhandled rejection:`, reason);
    process.exit(1);
  });

  await runFileServer({ logger });
}

function showHelp(): void {
  const { hostname, port } = defaultFileServerConfig;
  console.log(`
${APP_NAME} v${APP_VERSION}

Serves the current directory over HTTP on ${hostname}:${port}.

Usage:
  file-serve [options]

Options:
  --help, -h      Show this help message
  --version, -v   Show version information

Environment:
  LOG_LEVEL       silly | verbose | debug | info | warn | error | none
`);
}
