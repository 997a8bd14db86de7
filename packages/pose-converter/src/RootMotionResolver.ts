import { vec3 } from "gl-matrix";
import type { Vec3 } from "@pose-keyframes/shared-types";
import { createDebugLogger } from "./debug.js";

const logger = createDebugLogger("[RootMotionResolver]");

/**
 * Computes the root joint's local translation per output frame.
 *
 * root = (t.x − offset.x, t.y − offset.y, 0) − bindRootPosition
 *
 * The offset is captured from the first resolved frame when centering is on and is
 * read-only afterwards. The vertical (z) component of the source translation is
 * never transmitted.
 */
export class RootMotionResolver {
	private readonly _bindRootPosition: Vec3;
	private readonly _centerOnOrigin: boolean;
	private _offset: Vec3 | null = null;

	constructor(bindRootPosition: Readonly<Vec3>, centerOnOrigin: boolean) {
		this._bindRootPosition = [bindRootPosition[0], bindRootPosition[1], bindRootPosition[2]];
		this._centerOnOrigin = centerOnOrigin;
	}

	get centerOnOrigin(): boolean {
		return this._centerOnOrigin;
	}

	/** Offset captured at the first frame, or null before any frame was resolved */
	get offset(): Readonly<Vec3> | null {
		return this._offset;
	}

	resolve(translation: Readonly<Vec3>): Vec3 {
		if (!this._offset) {
			this._offset = this._centerOnOrigin ? [translation[0], translation[1], 0] : [0, 0, 0];
			logger.log(`Origin offset: (${this._offset[0]}, ${this._offset[1]}, 0)`);
		}

		const out: Vec3 = [translation[0], translation[1], 0];
		vec3.subtract(out, out, this._offset);
		vec3.subtract(out, out, this._bindRootPosition);
		return out;
	}
}
