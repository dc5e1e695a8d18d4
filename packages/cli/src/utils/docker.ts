// pattern: Imperative Shell
import Docker from "dockerode";

import type { Logger } from "pino";

/**
 * Create a Docker client, honouring DOCKER_HOST
 * (tcp://host:port, unix:///path/to.sock or a bare socket path)
 */
export function createDockerClient(
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env
): Docker {
  const dockerHost = env["DOCKER_HOST"];

  if (!dockerHost) {
    return new Docker();
  }

  logger.debug({ dockerHost }, "Using DOCKER_HOST environment variable");
  if (dockerHost.startsWith("tcp://")) {
    const url = new URL(dockerHost);
    return new Docker({
      host: url.hostname,
      port: Number.parseInt(url.port || "2375", 10),
      // Docker daemon typically uses HTTP even over TCP
      protocol: "http",
    });
  }
  if (dockerHost.startsWith("unix://")) {
    return new Docker({ socketPath: dockerHost.replace("unix://", "") });
  }
  return new Docker({ socketPath: dockerHost });
}
