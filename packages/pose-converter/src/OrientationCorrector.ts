import { quat } from "gl-matrix";
import type { JointRotation } from "@pose-keyframes/shared-types";
import { createJointRotation } from "./RotationConverter.js";

const X_AXIS: readonly [number, number, number] = [1, 0, 0];

/**
 * Fixed rotation of -180° about X that stands the body-model root upright in the
 * target skeleton (looking along -Y). Shared instance, do not modify.
 */
export const ROOT_CORRECTION: JointRotation = createJointRotation();
quat.setAxisAngle(ROOT_CORRECTION, X_AXIS, -Math.PI);

/**
 * ROOT_CORRECTION ∘ raw, written to a new rotation unless out is given.
 * Only the root joint is corrected.
 */
export function correctRootRotation(raw: JointRotation, out: JointRotation = createJointRotation()): JointRotation {
	quat.multiply(out, ROOT_CORRECTION, raw);
	return out;
}
