// Interview Dialogue Engine - Server entry point
// Wires the engine from the environment and starts the HTTP/WebSocket server.

import "dotenv/config";
import { loadAppConfig } from "./config.js";
import { loadInterviewConfig } from "./job-config.js";
import { createEngine } from "./bootstrap.js";
import { createAppServer } from "./server.js";
import { createConsoleLogger } from "./logger.js";
import { APP_NAME, APP_VERSION } from "./index.js";
import { errorMessage } from "./utils.js";

const logInit = createConsoleLogger("Init");

async function start(): Promise<void> {
  const appConfig = loadAppConfig();
  logInit.info(`Loading job configuration from ${appConfig.jobConfigPath}...`);
  const interviewConfig = await loadInterviewConfig(appConfig.jobConfigPath);
  logInit.info(`${interviewConfig.questions.length} questions loaded`);

  const { sessionManager } = createEngine(appConfig);
  sessionManager.startIdleSweep(appConfig.sessionSweepIntervalMs);

  const server = createAppServer({
    sessionManager,
    getInterviewConfig: () => interviewConfig,
    logger: createConsoleLogger("Server"),
  });

  const port = await server.listen(appConfig.port);
  logInit.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);

  const stop = (signal: string) => {
    logInit.info(`${signal} received, shutting down`);
    sessionManager.shutdown();
    server.close().then(
      () => {
        process.exitCode = 0;
      },
      (err: unknown) => {
        logInit.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      },
    );
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

start().catch((err: unknown) => {
  logInit.error(`Startup failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
