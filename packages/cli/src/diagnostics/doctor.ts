// pattern: Imperative Shell
// Setup doctor: gathers every check section in a fixed order

import { loadSccacheClientConfig } from "../config/sccache-client.js";
import { FileSystemError } from "../utils/errors.js";

import { checkClientConfig, type ClientConfigState } from "./config-checks.js";
import { checkConnectivity, type Connector } from "./connectivity.js";
import { checkContainer, tokenExportHints } from "./container-checks.js";
import {
  type ContainerProbe,
  DockerodeContainerProbe,
} from "./container-probe.js";
import { checkEnvironment } from "./env-checks.js";
import {
  checkLocalInstallation,
  collectDistStatus,
  createToolProbe,
  type ToolProbe,
} from "./local-checks.js";

import type { CheckSection, DoctorReport } from "./types.js";
import type { BoxSettings } from "../config/settings.js";
import type { Logger } from "pino";

export type DoctorSettings = Pick<
  BoxSettings,
  | "containerName"
  | "builderPort"
  | "schedulerPort"
  | "tokenFile"
  | "clientConfigPath"
>;

export interface DoctorDeps {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  containerProbe?: ContainerProbe;
  toolProbe?: ToolProbe;
  connect?: Connector;
  now?: () => Date;
}

/**
 * Load the client config, turning expected failures into a state
 */
export async function readClientConfig(
  path: string
): Promise<ClientConfigState> {
  try {
    const { config } = await loadSccacheClientConfig(path);
    return { kind: "loaded", path, config };
  } catch (error) {
    if (error instanceof FileSystemError && error.operation === "find") {
      return { kind: "missing", path };
    }
    return {
      kind: "invalid",
      path,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Count passed and total checks over the counted sections only
 */
export function summarize(
  sections: readonly CheckSection[]
): Pick<DoctorReport, "passed" | "total"> {
  const counted = sections.filter(s => s.counted).flatMap(s => s.checks);
  return {
    passed: counted.filter(c => c.passed).length,
    total: counted.length,
  };
}

export async function runDoctor(
  settings: DoctorSettings,
  deps: DoctorDeps
): Promise<DoctorReport> {
  const logger = deps.logger.child({ component: "doctor" });
  const env = deps.env ?? process.env;
  const containerProbe =
    deps.containerProbe ?? new DockerodeContainerProbe(logger);
  const toolProbe = deps.toolProbe ?? createToolProbe(logger);
  const now = deps.now ?? ((): Date => new Date());

  logger.debug(
    { container: settings.containerName, config: settings.clientConfigPath },
    "Running setup checks"
  );

  const clientConfig = await readClientConfig(settings.clientConfigPath);

  const container = await checkContainer(containerProbe, {
    containerName: settings.containerName,
    tokenFile: settings.tokenFile,
    env,
    clientConfig,
  });

  const [local, distStatus, connectivity] = await Promise.all([
    checkLocalInstallation(toolProbe),
    collectDistStatus(toolProbe),
    checkConnectivity(env["SCCACHE_SCHEDULER_URL"], settings, deps.connect),
  ]);

  const sections = [
    container.section,
    local,
    distStatus,
    tokenExportHints(container, settings),
    checkEnvironment(env),
    checkClientConfig(clientConfig, env),
    connectivity,
  ];

  const { passed, total } = summarize(sections);
  logger.debug({ passed, total }, "Setup checks finished");

  return {
    timestamp: now().toISOString(),
    sections,
    passed,
    total,
  };
}
