import { mat3, quat } from "gl-matrix";
import type { JointRotation, Vec3 } from "@pose-keyframes/shared-types";
import { NumericError } from "./errors.js";

/** Rotation angles (radians) below this are treated as no rotation */
export const ZERO_ANGLE_EPSILON = 1e-12;

// Scratch rotation matrix, column-major (gl-matrix layout)
const _rotationMatrix = new Float64Array(9);

/** New identity rotation [0, 0, 0, 1] */
export function createJointRotation(): JointRotation {
	const q = new Float64Array(4);
	q[3] = 1;
	return q;
}

/**
 * Convert an axis-angle vector (direction = axis, length = angle in radians)
 * to a unit quaternion [x, y, z, w].
 *
 * Builds the Rodrigues matrix R = cos θ·I + (1 − cos θ)·r̂r̂ᵗ + sin θ·K and converts it
 * with gl-matrix's trace-based quat.fromMat3. Angles below ZERO_ANGLE_EPSILON return the
 * identity without normalising the axis.
 *
 * @throws NumericError if the vector is not 3 finite numbers
 */
export function rotationVectorToQuat(r: ArrayLike<number>, out: JointRotation = createJointRotation()): JointRotation {
	if (r.length !== 3) {
		throw new NumericError(`Rotation vector must have 3 components, got ${r.length}`);
	}
	const x = r[0];
	const y = r[1];
	const z = r[2];
	if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
		throw new NumericError(`Non-finite rotation vector [${x}, ${y}, ${z}]`);
	}

	const theta = Math.hypot(x, y, z);
	if (!Number.isFinite(theta)) {
		throw new NumericError(`Rotation angle overflows for vector [${x}, ${y}, ${z}]`);
	}
	if (theta < ZERO_ANGLE_EPSILON) {
		quat.identity(out);
		return out;
	}

	const ux = x / theta;
	const uy = y / theta;
	const uz = z / theta;
	const c = Math.cos(theta);
	const s = Math.sin(theta);
	const t = 1 - c;

	mat3.set(
		_rotationMatrix,
		// column 0
		c + t * ux * ux, t * ux * uy + s * uz, t * ux * uz - s * uy,
		// column 1
		t * ux * uy - s * uz, c + t * uy * uy, t * uy * uz + s * ux,
		// column 2
		t * ux * uz + s * uy, t * uy * uz - s * ux, c + t * uz * uz
	);

	quat.fromMat3(out, _rotationMatrix);
	quat.normalize(out, out);
	return out;
}

/**
 * Convert N axis-angle vectors independently, preserving order.
 */
export function rotationVectorsToQuats(vectors: readonly ArrayLike<number>[]): JointRotation[] {
	return vectors.map((v) => rotationVectorToQuat(v));
}

/**
 * Inverse of rotationVectorToQuat. Picks the shortest-arc form (angle in [0, π]).
 */
export function quatToRotationVector(q: ArrayLike<number>, out: Vec3 = [0, 0, 0]): Vec3 {
	let x = q[0];
	let y = q[1];
	let z = q[2];
	let w = q[3];
	if (w < 0) {
		x = -x;
		y = -y;
		z = -z;
		w = -w;
	}

	const sinHalf = Math.hypot(x, y, z);
	if (sinHalf === 0) {
		out[0] = 0;
		out[1] = 0;
		out[2] = 0;
		return out;
	}

	// atan2 keeps precision for small angles where acos(w) does not
	const angle = 2 * Math.atan2(sinHalf, w);
	const k = angle / sinHalf;
	out[0] = x * k;
	out[1] = y * k;
	out[2] = z * k;
	return out;
}
