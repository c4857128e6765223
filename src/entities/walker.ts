import { FixedPoint } from "../core/fixed-point";
import {
  WORLD_HEIGHT,
  WORLD_WIDTH,
  type Direction,
  type GridCoord,
  type WalkResult,
  type WalkerKind,
  type WalkerState,
} from "../core/types";

const CAT_SPEED = new FixedPoint(0, 4);
const MOUSE_SPEED = new FixedPoint(0, 6);

export const WALKER_SPEED: Readonly<Record<WalkerKind, FixedPoint>> = {
  cat: CAT_SPEED,
  mouse: MOUSE_SPEED,
};

const wrapAxis = (value: FixedPoint, size: number): FixedPoint => {
  if (value.integer < 0) {
    return new FixedPoint(value.integer + size, value.fractional);
  }
  if (value.integer >= size) {
    return new FixedPoint(value.integer - size, value.fractional);
  }
  return value;
};

export class Walker {
  private x: FixedPoint;
  private y: FixedPoint;
  private direction: Direction;
  private readonly kind: WalkerKind;
  private state: WalkerState = "alive";

  constructor(x: number, y: number, direction: Direction, kind: WalkerKind) {
    this.x = new FixedPoint(x, 0);
    this.y = new FixedPoint(y, 0);
    this.direction = direction;
    this.kind = kind;
  }

  /**
   * Moves one tick in the current direction and reports whether the walker
   * entered a new cell. Leaving the grid wraps to the opposite edge.
   */
  walk(): WalkResult {
    const speed = WALKER_SPEED[this.kind];
    let crossed = false;

    switch (this.direction) {
      case "up": {
        const start = this.y;
        this.y = this.y.sub(speed);
        crossed = this.y.didOverflow(start);
        break;
      }
      case "down": {
        const start = this.y;
        this.y = this.y.add(speed);
        crossed = this.y.didOverflow(start);
        break;
      }
      case "left": {
        const start = this.x;
        this.x = this.x.sub(speed);
        crossed = this.x.didOverflow(start);
        break;
      }
      case "right": {
        const start = this.x;
        this.x = this.x.add(speed);
        crossed = this.x.didOverflow(start);
        break;
      }
    }

    this.x = wrapAxis(this.x, WORLD_WIDTH);
    this.y = wrapAxis(this.y, WORLD_HEIGHT);

    return crossed ? "new-square" : "none";
  }

  getX(): FixedPoint {
    return this.x;
  }

  getY(): FixedPoint {
    return this.y;
  }

  getCell(): GridCoord {
    return { x: this.x.integerPart(), y: this.y.integerPart() };
  }

  getDirection(): Direction {
    return this.direction;
  }

  setDirection(direction: Direction): void {
    this.direction = direction;
  }

  getType(): WalkerKind {
    return this.kind;
  }

  getState(): WalkerState {
    return this.state;
  }

  isAlive(): boolean {
    return this.state === "alive";
  }

  kill(): void {
    this.assertAlive("kill");
    this.state = "dead";
  }

  rescue(): void {
    this.assertAlive("rescue");
    this.state = "rescued";
  }

  private assertAlive(action: string): void {
    if (this.state !== "alive") {
      throw new Error(`Cannot ${action} a ${this.kind} that is already ${this.state}`);
    }
  }
}
