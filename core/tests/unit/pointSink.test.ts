import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CSV_HEADER, formatPoints, writePoints } from "../../src/ts/pointSink";

describe("formatPoints", () => {
  it("should write a header and one fixed-point row per point", () => {
    const csv = formatPoints([
      { x: 1, y: 2, z: 3 },
      { x: -2.5, y: 1.23456789, z: 10 },
    ]);
    expect(csv).toBe(
      "x,y,z\n1.000000,2.000000,3.000000\n-2.500000,1.234568,10.000000\n"
    );
  });

  it("should write only the header for an empty path", () => {
    expect(formatPoints([])).toBe(`${CSV_HEADER}\n`);
  });

  it("should not write negative zero", () => {
    expect(formatPoints([{ x: -1e-9, y: -0, z: 0 }])).toBe(
      "x,y,z\n0.000000,0.000000,0.000000\n"
    );
  });

  it("should honour the precision", () => {
    expect(formatPoints([{ x: 1.5, y: 2, z: -3.25 }], 2)).toBe(
      "x,y,z\n1.50,2.00,-3.25\n"
    );
    expect(formatPoints([{ x: 1.5, y: -0.2, z: 3 }], 0)).toBe("x,y,z\n2,0,3\n");
  });

  it("should keep every point, duplicates included, in order", () => {
    const csv = formatPoints([
      { x: 1, y: 0, z: 0 },
      { x: 1, y: 0, z: 0 },
      { x: 0, y: 0, z: 0 },
    ], 1);
    expect(csv.trimEnd().split("\n")).toEqual([
      "x,y,z",
      "1.0,0.0,0.0",
      "1.0,0.0,0.0",
      "0.0,0.0,0.0",
    ]);
  });
});

describe("writePoints", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "mewpath-sink-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should write the CSV and leave no temporary file", async () => {
    const file = path.join(dir, "out.csv");
    await writePoints(file, [{ x: 1, y: 2, z: 3 }], 3);

    expect(fs.readFileSync(file, "utf8")).toBe("x,y,z\n1.000,2.000,3.000\n");
    expect(fs.readdirSync(dir)).toEqual(["out.csv"]);
  });

  it("should replace an existing file", async () => {
    const file = path.join(dir, "out.csv");
    fs.writeFileSync(file, "old contents");
    await writePoints(file, []);

    expect(fs.readFileSync(file, "utf8")).toBe("x,y,z\n");
  });

  it("should reject when the directory does not exist", async () => {
    const file = path.join(dir, "missing", "out.csv");
    await expect(writePoints(file, [])).rejects.toThrow(/ENOENT/);
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
