import * as fs from "fs/promises";
import { PathPoint } from "@mewpath/types";
import { DEFAULT_PRECISION } from "./constants";

export const CSV_HEADER = "x,y,z";

function formatValue(value: number, precision: number): string {
  const text = value.toFixed(precision);
  // toFixed keeps the sign of tiny negatives: "-0.000000"
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text;
}

/**
 * Render points as CSV text with an `x,y,z` header, one row per point in
 * path order.
 */
export function formatPoints(
  points: Iterable<PathPoint>,
  precision: number = DEFAULT_PRECISION
): string {
  const rows = [CSV_HEADER];
  for (const point of points) {
    rows.push(
      `${formatValue(point.x, precision)},${formatValue(point.y, precision)},${formatValue(point.z, precision)}`
    );
  }
  return rows.join("\n") + "\n";
}

/**
 * Write points to a CSV file in one operation. The file is written to a
 * temporary sibling first and renamed into place, so a failed write leaves
 * no partial output behind.
 *
 * @throws Error if the file cannot be written
 */
export async function writePoints(
  filepath: string,
  points: Iterable<PathPoint>,
  precision: number = DEFAULT_PRECISION
): Promise<void> {
  const content = formatPoints(points, precision);
  const tempPath = `${filepath}.${process.pid}.tmp`;

  try {
    await fs.writeFile(tempPath, content, "utf8");
    await fs.rename(tempPath, filepath);
  } catch (e) {
    await fs.rm(tempPath, { force: true });
    throw e;
  }
}
