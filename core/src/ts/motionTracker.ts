import {
  AXES,
  AxisLetters,
  GCodeCommand,
  MachineState,
  MotionMode,
  PathPoint,
  Plane,
  PositionMode,
  Units,
  Vec3,
} from "@mewpath/types";
import { ArcSegment, getPlaneAxes, resolveArcCenter } from "./arcSampler";
import {
  DEFAULT_AXIS_LETTERS,
  DEFAULT_CURVE_RESOLUTION,
  MM_PER_INCH,
} from "./constants";

export interface MotionTrackerOptions {
  /** Letters feeding logical x/y/z (default X, Y, Z) */
  axisLetters?: AxisLetters;
  /** Points sampled per arc (default 20) */
  curveResolution?: number;
}

/**
 * Create a machine state at the origin, in absolute millimetres on the XY
 * plane, that has not yet seen a move.
 */
export function createMachineState(
  overrides: Partial<MachineState> = {}
): MachineState {
  return {
    position: { x: 0, y: 0, z: 0 },
    mode: MotionMode.LINEAR,
    plane: Plane.XY,
    positionMode: PositionMode.ABSOLUTE,
    units: Units.MM,
    tracking: false,
    ...overrides,
  };
}

const NO_POINTS: readonly PathPoint[] = [];

/**
 * Motion State Tracker
 *
 * Consumes commands in program order and emits the points the tool passes
 * through. The machine state passed in is owned by the tracker from then on
 * and is updated in place.
 */
export class MotionTracker {
  readonly state: MachineState;
  private readonly axisLetters: AxisLetters;
  private readonly curveResolution: number;
  private linearMoves = 0;
  private arcs = 0;

  constructor(
    state: MachineState = createMachineState(),
    options: MotionTrackerOptions = {}
  ) {
    this.state = state;
    this.axisLetters = options.axisLetters ?? { ...DEFAULT_AXIS_LETTERS };
    this.curveResolution = options.curveResolution ?? DEFAULT_CURVE_RESOLUTION;
  }

  /** Number of linear moves that emitted a point */
  get linearMoveCount(): number {
    return this.linearMoves;
  }

  /** Number of arcs sampled */
  get arcCount(): number {
    return this.arcs;
  }

  /**
   * Apply one command to the machine state.
   *
   * @returns The points the command moves through: one for a linear move,
   *   `curveResolution` for an arc, none otherwise
   * @throws Error if an arc's center cannot be determined
   */
  consume(command: GCodeCommand): Iterable<PathPoint> {
    switch (command.code) {
      case "G0":
      case "G1":
        this.state.mode = MotionMode.LINEAR;
        return this.linearMove(command);
      case "G2":
        this.state.mode = MotionMode.ARC_CLOCKWISE;
        return this.arcMove(command, true);
      case "G3":
        this.state.mode = MotionMode.ARC_COUNTERCLOCKWISE;
        return this.arcMove(command, false);
      case "G17":
        this.state.plane = Plane.XY;
        break;
      case "G18":
        this.state.plane = Plane.XZ;
        break;
      case "G19":
        this.state.plane = Plane.YZ;
        break;
      case "G20":
        this.state.units = Units.INCHES;
        break;
      case "G21":
        this.state.units = Units.MM;
        break;
      case "G90":
        this.state.positionMode = PositionMode.ABSOLUTE;
        break;
      case "G91":
        this.state.positionMode = PositionMode.RELATIVE;
        break;
    }
    return NO_POINTS;
  }

  /**
   * Trace a sequence of commands, draining every arc before moving on to
   * the next command.
   */
  *trace(commands: Iterable<GCodeCommand>): Generator<PathPoint> {
    for (const command of commands) {
      yield* this.consume(command);
    }
  }

  private get scale(): number {
    return this.state.units === Units.INCHES ? MM_PER_INCH : 1;
  }

  /**
   * Target position for a move; axes absent from the command keep their
   * current value. `null` when the command names none of the axes.
   */
  private target(command: GCodeCommand): Vec3 | null {
    const { position, positionMode } = this.state;
    const target: Vec3 = { ...position };
    let moved = false;

    for (const axis of AXES) {
      const value = command.axisValues[this.axisLetters[axis]];
      if (value === undefined) continue;
      moved = true;
      target[axis] =
        positionMode === PositionMode.RELATIVE
          ? position[axis] + value * this.scale
          : value * this.scale;
    }

    return moved ? target : null;
  }

  private moveTo(target: Vec3): PathPoint {
    this.state.position = target;
    this.state.tracking = true;
    return { x: target.x, y: target.y, z: target.z };
  }

  private linearMove(command: GCodeCommand): Iterable<PathPoint> {
    const target = this.target(command);
    if (!target) return NO_POINTS;

    this.linearMoves++;
    return [this.moveTo(target)];
  }

  private arcMove(command: GCodeCommand, clockwise: boolean): Iterable<PathPoint> {
    const words = command.axisValues;
    const target = this.target(command);
    const [firstLetter, secondLetter] = getPlaneAxes(this.state.plane).offsetLetters;

    // "G2" or "G2 F300" only sets the motion mode
    const hasGeometry = [firstLetter, secondLetter, "R"].some(
      (letter) => words[letter] !== undefined
    );
    if (!target && !hasGeometry) return NO_POINTS;

    const scaled = (value: number | undefined): number | undefined =>
      value === undefined ? undefined : value * this.scale;

    const start: PathPoint = { ...this.state.position };
    // An arc without target words returns to its start: a full circle
    const end: PathPoint = target ?? start;

    let center: PathPoint;
    try {
      center = resolveArcCenter({
        start,
        end,
        offsets: [scaled(words[firstLetter]), scaled(words[secondLetter])],
        radius: scaled(words.R),
        plane: this.state.plane,
        clockwise,
      });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new Error(`Arc on line ${command.lineNumber}: ${reason}`);
    }

    const segment = new ArcSegment({
      start,
      end,
      center,
      clockwise,
      plane: this.state.plane,
      resolution: this.curveResolution,
    });

    this.arcs++;
    this.moveTo({ x: end.x, y: end.y, z: end.z });
    return segment;
  }
}
