import { ErrorCode, codedError } from "../errors.js";
import { Pos } from "./pos.js";

/**
 * Axis-aligned image area with its origin at (0, 0)
 */
export class Frame {
    constructor(
        readonly w: number,
        readonly h: number
    ) {
        if (!(w > 0) || !(h > 0)) {
            throw codedError(ErrorCode.DegenerateGeometry, `Frame dimensions must be positive (got ${w}x${h})`);
        }
    }

    /** Boundary included; `margin` widens the bounds on every side */
    isInside(p: Pos, margin = 0): boolean {
        return p.x >= -margin && p.x <= this.w + margin && p.y >= -margin && p.y <= this.h + margin;
    }

    corners(): Pos[] {
        return [new Pos(0, 0), new Pos(this.w, 0), new Pos(this.w, this.h), new Pos(0, this.h)];
    }

    center(): Pos {
        return new Pos(this.w / 2, this.h / 2);
    }

    /** Length of the shorter side */
    minSide(): number {
        return Math.min(this.w, this.h);
    }
}
