import { createApp } from "./app.js";
import { bootstrapEnv } from "./bootstrapEnv.js";
import { loadLaunchConfig } from "./config.js";
import { startServer } from "./server.js";
import { installShutdownHandlers, lateBoundServer } from "./shutdown.js";
import { LaunchError } from "./types/launch.js";

bootstrapEnv();

const config = loadLaunchConfig();
const app = createApp();

// Handlers go in before listen so a SIGTERM during startup is not dropped by PID 1.
const shutdownTarget = lateBoundServer();
const disposeShutdown = installShutdownHandlers(shutdownTarget);

startServer(app, config)
  .then((server) => {
    shutdownTarget.bind(server);
    console.log(`server listening on ${config.host}:${config.port} (pid ${process.pid})`);
  })
  .catch((error: unknown) => {
    disposeShutdown();
    if (error instanceof LaunchError) {
      console.error(`startup failed ${error.message}`);
    } else {
      console.error("startup failed", error);
    }
    process.exit(1);
  });
