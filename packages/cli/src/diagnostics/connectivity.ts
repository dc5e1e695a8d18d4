// pattern: Mixed (unavoidable)
// TCP reachability of the scheduler and builder from this host

import { createConnection } from "node:net";

import { check, type CheckSection } from "./types.js";

export interface Endpoint {
  host: string;
  port: number;
}

export type Connector = (
  host: string,
  port: number,
  timeoutMs: number
) => Promise<boolean>;

export const CONNECT_TIMEOUT_MS = 3000;

/**
 * Extract host and port from a scheduler URL such as http://10.0.0.5:10600.
 * Without a written-out port, defaultPort is used; undefined when the host
 * or both ports are missing.
 */
export function parseSchedulerUrl(
  url: string | undefined,
  defaultPort?: number
): Endpoint | undefined {
  if (!url) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }

  // URL drops a port equal to the scheme default, so read it back from the text
  const port =
    parsed.port ||
    (/^[a-z][a-z0-9+.-]*:\/\/[^/]*:(\d+)(?:[/?#]|$)/i.exec(url)?.[1] ?? "");
  const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1");
  if (!host) return undefined;
  if (port) return { host, port: Number.parseInt(port, 10) };
  return defaultPort === undefined ? undefined : { host, port: defaultPort };
}

/**
 * Resolve true once a TCP connection is established; false on error or timeout
 */
export function canConnect(
  host: string,
  port: number,
  timeoutMs: number
): Promise<boolean> {
  return new Promise(resolve => {
    const socket = createConnection({ host, port });
    const finish = (result: boolean): void => {
      socket.destroy();
      resolve(result);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

export interface ConnectivityPorts {
  /** Used when the scheduler URL carries no port */
  schedulerPort: number;
  builderPort: number;
}

export async function checkConnectivity(
  schedulerUrl: string | undefined,
  { schedulerPort, builderPort }: ConnectivityPorts,
  connect: Connector = canConnect
): Promise<CheckSection> {
  const section: CheckSection = {
    title: "Runtime connectivity",
    counted: true,
    checks: [],
    notes: [],
  };

  const endpoint = parseSchedulerUrl(schedulerUrl, schedulerPort);
  if (!endpoint) {
    section.checks.push(
      check("Scheduler URL has a host", false, schedulerUrl)
    );
    section.notes.push(
      "Could not parse scheduler URL, skipping runtime connectivity checks."
    );
    return section;
  }

  const { host, port } = endpoint;
  const [scheduler, builder] = await Promise.all([
    connect(host, port, CONNECT_TIMEOUT_MS),
    connect(host, builderPort, CONNECT_TIMEOUT_MS),
  ]);

  section.checks.push(
    check(`Host can connect to scheduler at ${host}:${port}`, scheduler),
    check(`Host can connect to builder at ${host}:${builderPort}`, builder)
  );
  return section;
}
