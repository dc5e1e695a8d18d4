// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  name?: string;
  msg?: string;
  err?: unknown;
  [key: string]: unknown;
}

export interface RendererOptions {
  colorize?: boolean;
}

// Format error object with stack trace
function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const message = "message" in err ? err.message : undefined;
  const stack = "stack" in err ? err.stack : undefined;
  const lines: string[] = [];

  if (typeof message === "string" && message) {
    lines.push(chalk.yellow(`    ${message}`));
  }

  // Skip the first stack line (the message) and keep at most 8 frames
  if (typeof stack === "string") {
    for (const line of stack.split("\n").slice(1, 9)) {
      const trimmedLine = line.trim();
      if (trimmedLine) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

function levelGlyph(
  level: number,
  chalk: ChalkInstance
): { glyph: string; msgColor: ChalkInstance } {
  switch (level) {
    case 10: // trace
      return { glyph: chalk.green("+"), msgColor: chalk.reset };
    case 20: // debug
      return { glyph: chalk.cyan("="), msgColor: chalk.reset };
    case 30: // info
      return { glyph: chalk.gray(">"), msgColor: chalk.reset };
    case 40: // warn
      return { glyph: chalk.yellowBright("W"), msgColor: chalk.yellow };
    case 50: // error
      return { glyph: chalk.inverse.red("E"), msgColor: chalk.red };
    case 60: // fatal
      return { glyph: chalk.inverse.redBright("E"), msgColor: chalk.red };
    default:
      return { glyph: chalk.gray("  LOG  "), msgColor: chalk.reset };
  }
}

// Format a single log object to a nice string
export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  const {
    level,
    time: _time,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    msg,
    err,
    ...extra
  } = logObj;

  const { glyph, msgColor } = levelGlyph(level, chalk);
  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, chalk) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${glyph} ${formattedMsg}${extraStr}${errorStr}\n`;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

/**
 * Render a chunk of newline-delimited pino JSON. Lines that are not
 * pino records pass through unchanged.
 */
export function renderLogChunk(chunk: string, chalk: ChalkInstance): string {
  const formattedLines: string[] = [];

  for (const line of chunk.split("\n")) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      formattedLines.push(
        isPinoLogObject(parsed) ? formatLogObject(parsed, chalk) : `${line}\n`
      );
    } catch {
      formattedLines.push(`${line}\n`);
    }
  }

  return formattedLines.join("");
}

// Create a pretty renderer stream like pino-pretty
export function createRenderer(options: RendererOptions = {}): Transform {
  const chalk = new Chalk({ level: options.colorize === false ? 0 : 1 });

  return new Transform({
    // Pino sends newline-delimited JSON strings, not objects
    objectMode: false,
    transform(chunk: Buffer | string, _encoding, callback): void {
      callback(null, renderLogChunk(chunk.toString(), chalk));
    },
  });
}
