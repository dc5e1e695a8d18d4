import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";

import { createRenderer, formatLogObject, renderLogChunk } from "./renderer.js";

const plain = new Chalk({ level: 0 });

describe("formatLogObject", () => {
  it("should drop pino bookkeeping fields", () => {
    expect(
      formatLogObject(
        { level: 30, time: 1, pid: 2, hostname: "h", name: "n", msg: "hello" },
        plain
      )
    ).toBe("> hello\n");
  });

  it("should append extra fields as JSON", () => {
    expect(
      formatLogObject({ level: 40, msg: "careful", container: "sccache-dist" }, plain)
    ).toBe('W careful {"container":"sccache-dist"}\n');
  });

  it("should print the error message and stack frames", () => {
    const line = formatLogObject(
      {
        level: 50,
        msg: "failed",
        err: {
          message: "boom",
          stack: "Error: boom\n    at a (f.ts:1:1)\n    at b (g.ts:2:2)",
        },
      },
      plain
    );

    expect(line).toBe(
      "E failed\n    boom\n        at a (f.ts:1:1)\n        at b (g.ts:2:2)\n"
    );
  });

  it.each<[number, string]>([
    [10, "+"],
    [20, "="],
    [60, "E"],
  ])("should mark level %i with %s", (level, glyph) => {
    expect(formatLogObject({ level, msg: "m" }, plain)).toBe(`${glyph} m\n`);
  });
});

describe("renderLogChunk", () => {
  it("should render pino records and pass other lines through", () => {
    expect(
      renderLogChunk('not json\n{"level":20,"msg":"dbg"}\n\n{"foo":1}\n', plain)
    ).toBe('not json\n= dbg\n{"foo":1}\n');
  });
});

describe("createRenderer", () => {
  it("should transform written records", async () => {
    const renderer = createRenderer({ colorize: false });
    const output = new Promise<string>(resolve => {
      const chunks: string[] = [];
      renderer.on("data", (chunk: Buffer) => chunks.push(chunk.toString()));
      renderer.on("end", () => resolve(chunks.join("")));
    });

    renderer.write('{"level":30,"msg":"ready"}\n');
    renderer.end();

    await expect(output).resolves.toBe("> ready\n");
  });
});
