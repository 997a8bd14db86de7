import { mat3, vec3 } from "gl-matrix";
import {
	BODY_JOINT_COUNT,
	HAND_JOINT_COUNT,
	type JointRotation,
	type PoseRecord,
	type PoseSample,
	type PoseSequence,
	type Vec3
} from "@pose-keyframes/shared-types";
import { rotationVectorToQuat } from "./RotationConverter.js";
import { NumericError, ShapeMismatchError, describeLocation } from "./errors.js";
import { createDebugLogger } from "./debug.js";

const logger = createDebugLogger("[PoseSampleAssembler]");

/**
 * Hand coordinate fix, row-major: diag(1, 1, -1).
 * Reconciles the handedness of the hand-pose encoding with the target skeleton.
 * Applied to both hands.
 */
export const HAND_COORDINATE_FIX: readonly number[] = Object.freeze([
	1, 0, 0,
	0, 1, 0,
	0, 0, -1
]);

// Raw hand vectors are row vectors (v · M). gl-matrix reads mat3 column-major and
// computes M · v, so loading the row-major values as-is gives Mᵀ · v = v · M.
const _handFix = mat3.fromValues(
	HAND_COORDINATE_FIX[0], HAND_COORDINATE_FIX[1], HAND_COORDINATE_FIX[2],
	HAND_COORDINATE_FIX[3], HAND_COORDINATE_FIX[4], HAND_COORDINATE_FIX[5],
	HAND_COORDINATE_FIX[6], HAND_COORDINATE_FIX[7], HAND_COORDINATE_FIX[8]
);
const _handVector = new Float64Array(3);

/** Source field names, as written by the body-model fitter */
export const RECORD_FIELDS = {
	globalOrient: "global_orient",
	bodyPose: "body_pose",
	leftHandPose: "left_hand_pose",
	rightHandPose: "right_hand_pose",
	transl: "transl"
} as const;

type VectorField = "globalOrient" | "bodyPose" | "leftHandPose" | "rightHandPose";

/** Expected joint count per rotation field */
export const EXPECTED_JOINT_COUNTS: Readonly<Record<VectorField, number>> = Object.freeze({
	globalOrient: 1,
	bodyPose: BODY_JOINT_COUNT - 1,
	leftHandPose: HAND_JOINT_COUNT,
	rightHandPose: HAND_JOINT_COUNT
});

const VECTOR_FIELDS: readonly VectorField[] = ["globalOrient", "bodyPose", "leftHandPose", "rightHandPose"];

function checkVector(vector: ArrayLike<number>, recordIndex: number, field: string, joint?: number): void {
	const context = { recordIndex, field, joint };
	if (vector.length !== 3) {
		throw new ShapeMismatchError(
			`${describeLocation(context)}: expected 3 components, got ${vector.length}`,
			context
		);
	}
	for (let i = 0; i < 3; i++) {
		if (!Number.isFinite(vector[i])) {
			throw new NumericError(
				`${describeLocation(context)}: non-finite component ${vector[i]} at position ${i}`,
				context
			);
		}
	}
	if (!Number.isFinite(Math.hypot(vector[0], vector[1], vector[2]))) {
		throw new NumericError(`${describeLocation(context)}: vector length overflows`, context);
	}
}

/**
 * Check joint counts, vector widths and finiteness of one record.
 * @throws ShapeMismatchError on a layout mismatch
 * @throws NumericError on a non-finite value
 */
export function validatePoseRecord(record: PoseRecord, recordIndex: number): void {
	for (const key of VECTOR_FIELDS) {
		const field = RECORD_FIELDS[key];
		const vectors = record[key];
		const expected = EXPECTED_JOINT_COUNTS[key];
		if (!Array.isArray(vectors) || vectors.length !== expected) {
			const actual = Array.isArray(vectors) ? vectors.length : "no";
			throw new ShapeMismatchError(
				`${describeLocation({ recordIndex, field })}: expected ${expected} joints, got ${actual}`,
				{ recordIndex, field }
			);
		}
		vectors.forEach((vector, joint) => checkVector(vector, recordIndex, field, joint));
	}
	checkVector(record.transl, recordIndex, RECORD_FIELDS.transl);
}

function convertHand(vectors: readonly Vec3[]): JointRotation[] {
	return vectors.map((v) => {
		vec3.transformMat3(_handVector, v, _handFix);
		return rotationVectorToQuat(_handVector);
	});
}

function assembleValidated(record: PoseRecord): PoseSample {
	const body = [...record.globalOrient, ...record.bodyPose].map((v) => rotationVectorToQuat(v));
	const translation: Vec3 = [record.transl[0], record.transl[1], record.transl[2]];

	return Object.freeze({
		body: Object.freeze(body),
		leftHand: Object.freeze(convertHand(record.leftHandPose)),
		rightHand: Object.freeze(convertHand(record.rightHandPose)),
		translation: Object.freeze(translation)
	});
}

/**
 * Convert one record into a PoseSample: 22 body rotations (global orientation first),
 * 15 + 15 hand rotations with the coordinate fix applied, translation unchanged.
 */
export function assemblePoseSample(record: PoseRecord, recordIndex: number = 0): PoseSample {
	validatePoseRecord(record, recordIndex);
	return assembleValidated(record);
}

/**
 * Build a PoseSequence. Every record is validated before any is converted, so a single
 * malformed record rejects the whole sequence.
 */
export function createPoseSequence(records: readonly PoseRecord[]): PoseSequence {
	if (records.length === 0) {
		throw new ShapeMismatchError("Pose sequence is empty");
	}
	records.forEach((record, index) => validatePoseRecord(record, index));

	const samples = records.map((record) => assembleValidated(record));
	logger.log(`Assembled ${samples.length} pose sample(s)`);
	return Object.freeze({ samples: Object.freeze(samples) });
}
