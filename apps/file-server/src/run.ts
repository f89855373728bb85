import {
  ServerManager,
  type FileServerConfigInput,
  type ServerAddress,
} from "@file-serve/webserver";
import { Logger, getErrorMessage } from "@file-serve/utils";

/**
 * The subset of process the shutdown handlers attach to
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface RunOptions {
  config?: FileServerConfigInput;
  logger?: Logger;
  /** Receives the startup line; defaults to stdout */
  print?: (line: string) => void;
  exit?: (code: number) => void;
  signals?: SignalSource;
}

export interface RunningFileServer {
  manager: ServerManager;
  address: ServerAddress;
  /** Detach the signal handlers */
  dispose: () => void;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

const processSignals: SignalSource = {
  on: (event, listener) => process.on(event, listener),
  removeListener: (event, listener) => process.removeListener(event, listener),
};

/**
 * Start serving, print the startup line, and exit on SIGINT/SIGTERM.
 * Resolves null when the server could not start (exit(1) has been called).
 */
export async function runFileServer(
  options: RunOptions = {},
): Promise<RunningFileServer | null> {
  const logger = options.logger ?? Logger.getInstance({ useStderr: true });
  const print = options.print ?? ((line: string): void => console.log(line));
  const exit = options.exit ?? ((code: number): void => process.exit(code));
  const signals = options.signals ?? processSignals;

  const manager = new ServerManager({
    logger,
    ...(options.config ? { config: options.config } : {}),
    onError: () => exit(1),
  });

  let address: ServerAddress;
  try {
    address = await manager.start();
  } catch (error) {
    logger.error(`❌ ${getErrorMessage(error)}`);
    exit(1);
    return null;
  }

  print(manager.getConfig().startupMessage);

  const removers: Array<() => void> = [];
  const dispose = (): void => {
    for (const remove of removers.splice(0)) {
      remove();
    }
  };

  const gracefulShutdown = async (signal: NodeJS.Signals): Promise<void> => {
    dispose();
    logger.info(`Received ${signal}, shutting down...`);

    try {
      await manager.stop();
      exit(0);
    } catch (error) {
      logger.error(`Error during shutdown: ${getErrorMessage(error)}`);
      exit(1);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    const handler = (): void => {
      void gracefulShutdown(signal);
    };
    signals.on(signal, handler);
    removers.push(() => signals.removeListener(signal, handler));
  }

  return { manager, address, dispose };
}
