/**
 * Integration tests for reading G-code programs from disk
 */

import * as path from "path";
import { readProgram } from "../../src/ts";

/** Get absolute path to a fixture file */
const fixturePath = (name: string): string =>
  path.join(__dirname, "../fixtures", name);

describe("readProgram", () => {
  it("should read and parse square.gcode", async () => {
    const result = await readProgram(fixturePath("square.gcode"));

    expect(result.commands.map((c) => c.code)).toEqual([
      "G21",
      "G90",
      "G0",
      "G1",
      "G1",
      "G1",
      "G3",
      "G1",
      "M5",
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("should keep arc offsets and comments", async () => {
    const result = await readProgram(fixturePath("square.gcode"));
    const arc = result.commands.find((c) => c.code === "G3");

    expect(arc).toEqual({
      code: "G3",
      axisValues: { X: -5, Y: 5, I: 0, J: -5 },
      lineNumber: 8,
      comment: "corner",
    });
  });

  it("should reject when the file does not exist", async () => {
    await expect(readProgram(fixturePath("missing.gcode"))).rejects.toThrow(
      /ENOENT/
    );
  });
});
