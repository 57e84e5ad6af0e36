export type ShutdownSignal = "SIGTERM" | "SIGINT";

export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

export interface ShutdownOptions {
  signals?: ShutdownSignal[];
  source?: SignalSource;
  exit?: (code: number) => void;
  log?: (message: string) => void;
  error?: (message: string) => void;
}

export interface LateBoundServer extends ClosableServer {
  bind(server: ClosableServer): void;
}

/**
 * Stand-in handed to the signal handlers before `listen` resolves.
 * Closing it before a server is bound completes immediately.
 */
export function lateBoundServer(): LateBoundServer {
  let target: ClosableServer | undefined;
  return {
    bind(server) {
      target = server;
    },
    close(callback) {
      if (!target) {
        callback();
        return;
      }
      target.close(callback);
    },
  };
}

/**
 * The server is PID 1 inside the container, so it owns signal handling:
 * stop accepting connections, then exit.
 */
export function installShutdownHandlers(
  server: ClosableServer,
  options: ShutdownOptions = {},
): () => void {
  const signals = options.signals ?? ["SIGTERM", "SIGINT"];
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const log = options.log ?? ((message: string) => console.log(message));
  const logError = options.error ?? ((message: string) => console.error(message));

  const listeners = new Map<ShutdownSignal, () => void>();
  const dispose = () => {
    for (const [signal, listener] of listeners) {
      source.off(signal, listener);
    }
    listeners.clear();
  };

  for (const signal of signals) {
    const listener = () => {
      dispose();
      log(`received ${signal}, closing server`);
      server.close((err) => {
        if (err) {
          logError(`server close failed: ${err.message}`);
          exit(1);
          return;
        }
        exit(0);
      });
    };
    listeners.set(signal, listener);
    source.once(signal, listener);
  }

  return dispose;
}
