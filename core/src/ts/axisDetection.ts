import { Axis, AxisLetterSelection, AxisLetters, GCodeCommand } from "@mewpath/types";
import { AXIS_DETECTION_LINES, NON_AXIS_LETTERS } from "./constants";

const MOTION_CODES = ["G0", "G1", "G2", "G3"];

/**
 * Count how often each letter carries a value in the motion commands of the
 * first `lineLimit` lines. Letters are kept in the order first seen.
 */
export function countAxisWords(
  commands: Iterable<GCodeCommand>,
  lineLimit: number = AXIS_DETECTION_LINES
): Map<string, number> {
  const counts = new Map<string, number>();

  for (const command of commands) {
    if (command.lineNumber > lineLimit) break;
    if (!MOTION_CODES.includes(command.code)) continue;

    for (const letter of Object.keys(command.axisValues)) {
      if (NON_AXIS_LETTERS.includes(letter)) continue;
      counts.set(letter, (counts.get(letter) ?? 0) + 1);
    }
  }

  return counts;
}

/**
 * Fill in axis letters left to detection with the most frequent free
 * letter. Ties go to the letter seen first.
 *
 * @example
 * ```typescript
 * const { commands } = parseProgram("G1 X0 U90\nG1 X10 U180");
 * detectAxisLetters(commands, { x: "X", y: null, z: "Z" });
 * // => { x: "X", y: "U", z: "Z" }
 * ```
 *
 * @throws Error if no free letter is left for an axis
 */
export function detectAxisLetters(
  commands: Iterable<GCodeCommand>,
  selection: AxisLetterSelection,
  lineLimit: number = AXIS_DETECTION_LINES
): AxisLetters {
  const taken = new Set<string>();
  for (const letter of Object.values(selection)) {
    if (letter !== null) taken.add(letter);
  }

  const needsDetection = Object.values(selection).includes(null);
  const counts = needsDetection
    ? countAxisWords(commands, lineLimit)
    : new Map<string, number>();

  const resolve = (axis: Axis): string => {
    const fixed = selection[axis];
    if (fixed !== null) return fixed;

    let best: string | undefined;
    let bestCount = 0;
    for (const [letter, count] of counts) {
      if (taken.has(letter)) continue;
      if (best === undefined || count > bestCount) {
        best = letter;
        bestCount = count;
      }
    }
    if (best === undefined) {
      throw new Error(
        `Could not detect the ${axis} axis letter: no free axis words in the first ${lineLimit} lines`
      );
    }

    taken.add(best);
    return best;
  };

  return { x: resolve("x"), y: resolve("y"), z: resolve("z") };
}
