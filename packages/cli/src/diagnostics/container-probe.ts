// pattern: Mixed (unavoidable)
// Docker Engine API access for the in-container checks

import { PassThrough } from "node:stream";

import { createDockerClient } from "../utils/docker.js";

import type Docker from "dockerode";
import type { Logger } from "pino";

export interface ContainerExecResult {
  success: boolean;
  /** Trimmed stdout on success, otherwise a description of the failure */
  output: string;
}

export interface ContainerProbe {
  /** True when a running container has exactly this name */
  isRunning(name: string): Promise<boolean>;
  exec(name: string, cmd: readonly string[]): Promise<ContainerExecResult>;
}

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString("utf8");
}

export class DockerodeContainerProbe implements ContainerProbe {
  private docker: Docker;
  private logger: Logger;

  constructor(logger: Logger, docker?: Docker) {
    this.logger = logger;
    this.docker = docker ?? createDockerClient(logger);
  }

  async isRunning(name: string): Promise<boolean> {
    try {
      const containers = await this.docker.listContainers({
        filters: { name: [`^/${name}$`] },
      });
      return containers.some(c => c.Names.includes(`/${name}`));
    } catch (error) {
      this.logger.debug({ err: error, name }, "Could not list containers");
      return false;
    }
  }

  async exec(
    name: string,
    cmd: readonly string[]
  ): Promise<ContainerExecResult> {
    if (!(await this.isRunning(name))) {
      return { success: false, output: `Container '${name}' is not running.` };
    }

    try {
      const exec = await this.docker.getContainer(name).exec({
        Cmd: [...cmd],
        AttachStdout: true,
        AttachStderr: true,
        Tty: false,
      });
      const stream = await exec.start({ hijack: true, stdin: false });

      // Tty is false, so stdout and stderr arrive multiplexed
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      const readStdout = collect(stdout);
      const readStderr = collect(stderr);
      this.docker.modem.demuxStream(stream, stdout, stderr);

      await new Promise<void>((resolve, reject) => {
        stream.on("end", () => resolve());
        stream.on("close", () => resolve());
        stream.on("error", reject);
      });

      const info = await exec.inspect();
      if (info.ExitCode === 0) {
        return { success: true, output: readStdout().trim() };
      }
      return {
        success: false,
        output: `Error code ${info.ExitCode ?? "unknown"} running ${JSON.stringify(cmd)}: ${readStderr().trim()}`,
      };
    } catch (error) {
      this.logger.debug({ err: error, name, cmd }, "Container exec failed");
      return {
        success: false,
        output: `Unexpected error running ${JSON.stringify(cmd)}: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}
