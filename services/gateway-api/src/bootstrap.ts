/**
 * Startup sequence, kept apart from the process entry point so it can be
 * driven from tests.
 *
 * Configuration is loaded before anything else is built: a ConfigError
 * rejects here and no server is created, let alone bound.
 */

import type { Server } from "node:http";
import { createRootLogger, type Logger } from "@speech-gateway/logging";
import { CachedCredentialProvider } from "@speech-gateway/credentials";
import { createGatewayServer, type ServerDeps } from "./server.js";
import { SpeechGateway } from "./gateway.js";
import { loadConfig } from "./config-loader.js";
import { buildSpeechStack } from "./compose.js";

export interface StartOptions {
  /** Overrides PORT; 0 picks a free port. */
  readonly port?: number;
  /** Overrides HOST. */
  readonly host?: string;
}

export interface RunningGateway {
  readonly server: Server;
  readonly deps: ServerDeps;
  readonly logger: Logger;
  /** Port actually bound. */
  readonly port: number;
  /** Close the readiness gate, then stop accepting connections. */
  close(): Promise<void>;
}

export async function startGateway(
  env: Record<string, string | undefined> = process.env,
  options: StartOptions = {},
): Promise<RunningGateway> {
  const config = loadConfig(env);

  const rootLogger = createRootLogger({ level: config.loggingEnabled ? "debug" : "info" });
  const log = rootLogger.child({ component: "startup" });

  const { adapter, source } = buildSpeechStack(config, rootLogger);
  const credentials = new CachedCredentialProvider(source, rootLogger, {
    timeoutMs: config.upstream.credentialTimeoutMs,
  });
  const gateway = new SpeechGateway({ adapter, credentials, config, logger: rootLogger });

  // Readiness gate stays closed until the port is bound
  const deps: ServerDeps = {
    gateway,
    corsOrigins: config.corsOrigins,
    limits: config.limits,
    logger: rootLogger,
    ready: false,
  };

  const server = createGatewayServer(deps);
  const host = options.host ?? config.host;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? config.listenPort, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.listenPort;

  deps.ready = true;
  log.info("Speech gateway started", {
    port,
    host,
    provider: adapter.providerId,
    credentialSource: source.name,
  });

  return {
    server,
    deps,
    logger: rootLogger,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        deps.ready = false;
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
