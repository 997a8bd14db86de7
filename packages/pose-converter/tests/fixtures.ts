import {
	BODY_JOINT_NAMES,
	LHAND_JOINT_NAMES,
	RHAND_JOINT_NAMES,
	type PoseRecord,
	type SkeletonBinding,
	type Vec3
} from "@pose-keyframes/shared-types";

export function zeros(count: number): Vec3[] {
	return Array.from({ length: count }, (): Vec3 => [0, 0, 0]);
}

export function makeRecord(overrides: Partial<PoseRecord> = {}): PoseRecord {
	return {
		globalOrient: zeros(1),
		bodyPose: zeros(21),
		leftHandPose: zeros(15),
		rightHandPose: zeros(15),
		transl: [0, 0, 0],
		...overrides
	};
}

/** Deterministic, non-trivial records: every joint rotates a little more each sample */
export function swayingRecords(count: number): PoseRecord[] {
	return Array.from({ length: count }, (_, i) => {
		const a = 0.01 * (i + 1);
		const vectors = (n: number, axis: number): Vec3[] =>
			Array.from({ length: n }, (_, j): Vec3 => {
				const v: Vec3 = [0, 0, 0];
				v[(axis + j) % 3] = a * (j + 1) * 0.1;
				return v;
			});
		return makeRecord({
			globalOrient: [[a, 0.2, 0]],
			bodyPose: vectors(21, 0),
			leftHandPose: vectors(15, 1),
			rightHandPose: vectors(15, 2),
			transl: [0.05 * i, 0.5 - 0.02 * i, 1 + 0.01 * i]
		});
	});
}

export function smplxBinding(bindRootPosition: Vec3 = [0, 0, 0]): SkeletonBinding {
	return {
		bodyJoints: BODY_JOINT_NAMES,
		leftHandJoints: LHAND_JOINT_NAMES,
		rightHandJoints: RHAND_JOINT_NAMES,
		bindRootPosition
	};
}

/** The value fn throws, for asserting error context */
export function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("Expected function to throw");
}
