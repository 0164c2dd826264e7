import { ConversionProgress } from "@mewpath/types";
import { convertProgram, defaultOutputPath } from "../../src/ts/converter";

const PRECISION = 6;

describe("convertProgram", () => {
  it("should trace linear moves from the origin", () => {
    const result = convertProgram("G1 X10 Y0 Z0");
    expect(result.points).toEqual([{ x: 10, y: 0, z: 0 }]);
    expect(result.linearMoveCount).toBe(1);
    expect(result.arcCount).toBe(0);
  });

  it("should emit one point per move and the resolution per arc", () => {
    const result = convertProgram(
      ["G21", "G1 X10", "G1", "G2 X0 Y10 I0 J10", "G4 P50", "G1 X0 Y0"].join("\n"),
      { curveResolution: 5 }
    );
    expect(result.points).toHaveLength(2 + 5);
    expect(result.linearMoveCount).toBe(2);
    expect(result.arcCount).toBe(1);
    expect(result.points[5]).toEqual({ x: 0, y: 10, z: 0 });
  });

  it("should wrap a rotational axis around the tube", () => {
    const result = convertProgram("G1 X5 U90", {
      axisLetters: { y: "U" },
      diameter: 3,
      cylindricalLongAxis: "x",
    });
    const [p] = result.points;
    expect(p.x).toBeCloseTo(5, PRECISION);
    expect(p.y).toBeCloseTo(0, PRECISION);
    expect(p.z).toBeCloseTo(1.5, PRECISION);
  });

  it("should sample arcs before the cylindrical transform", () => {
    const result = convertProgram("G1 X10\nG3 X0 Y10 I-10 J0", {
      curveResolution: 2,
      diameter: 2,
    });
    // (10, 0) -> arc through (7.07, 7.07) to (0, 10), then wrapped
    const mid = result.points[1];
    expect(mid.x).toBeCloseTo(10 * Math.SQRT1_2, PRECISION);
    expect(Math.hypot(mid.y, mid.z)).toBeCloseTo(1, PRECISION);
  });

  it("should skip malformed words and keep going", () => {
    const result = convertProgram("G1 X4 Y4\nG1 X10 Yabc\nG1 Z1");
    expect(result.points).toEqual([
      { x: 4, y: 4, z: 0 },
      { x: 10, y: 4, z: 0 },
      { x: 10, y: 4, z: 1 },
    ]);
    expect(result.warnings).toEqual([
      { lineNumber: 2, word: "Yabc", message: "Malformed word 'Yabc'" },
    ]);
  });

  it("should fail on an arc without a centre", () => {
    expect(() => convertProgram("G1 X1\nG2 X5 Y5")).toThrow(
      "Arc on line 2: missing center offsets or R radius"
    );
  });

  it("should validate options before reading the program", () => {
    expect(() => convertProgram("G2 X5 Y5", { curveResolution: 0 })).toThrow(
      /^Invalid configuration: curve resolution/
    );
  });

  describe("progress", () => {
    it("should report at most the requested number of updates", () => {
      const updates: ConversionProgress[] = [];
      const program = Array.from({ length: 10 }, (_, i) => `G1 X${i}`).join("\n");

      convertProgram(program, {
        progressUpdates: 5,
        onProgress: (progress) => updates.push(progress),
      });

      expect(updates.map((u) => u.linesProcessed)).toEqual([2, 4, 6, 8, 10]);
      expect(updates.map((u) => u.percent)).toEqual([20, 40, 60, 80, 100]);
      expect(updates.every((u) => u.totalLines === 10)).toBe(true);
    });

    it("should finish at 100% when the program ends in comments", () => {
      const updates: ConversionProgress[] = [];
      convertProgram("G1 X1\n; end\n", { onProgress: (p) => updates.push(p) });

      expect(updates).toEqual([
        { linesProcessed: 1, totalLines: 3, percent: 33 },
        { linesProcessed: 3, totalLines: 3, percent: 100 },
      ]);
    });
  });
});

describe("defaultOutputPath", () => {
  it("should replace the extension with .csv", () => {
    expect(defaultOutputPath("/data/tube.gcode")).toBe("/data/tube.csv");
  });

  it("should add .csv to a file without an extension", () => {
    expect(defaultOutputPath("/data/print")).toBe("/data/print.csv");
  });
});
