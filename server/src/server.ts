import { createServer, type RequestListener, type Server } from "node:http";
import { z } from "zod";
import { LaunchError, type LaunchConfig } from "./types/launch.js";

const portSchema = z
  .string()
  .regex(/^\d+$/u, "port must be a decimal integer")
  .transform((value) => Number(value))
  .pipe(z.number().int().min(1, "port must be >= 1").max(65535, "port must be <= 65535"));

export function parseListenPort(raw: string): number {
  const result = portSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "invalid port";
    throw new LaunchError("INVALID_PORT", `${JSON.stringify(raw)} (${reason})`);
  }
  return result.data;
}

export function startServer(app: RequestListener, config: Readonly<LaunchConfig>): Promise<Server> {
  let port: number;
  try {
    port = parseListenPort(config.port);
  } catch (error) {
    return Promise.reject(error);
  }

  const server = createServer(app);
  return new Promise<Server>((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        reject(new LaunchError("PORT_IN_USE", `${config.host}:${port} is already in use`));
        return;
      }
      reject(new LaunchError("LISTEN_FAILED", err.message));
    };
    server.once("error", onError);
    server.listen(port, config.host, () => {
      server.off("error", onError);
      resolve(server);
    });
  });
}
