import {
	BODY_JOINT_COUNT,
	HAND_JOINT_COUNT,
	type AnimationTrack,
	type JointRotation,
	type PoseSample,
	type SkeletonBinding,
	type TrackFrame,
	type Vec3
} from "@pose-keyframes/shared-types";
import type { FrameSelection } from "./FrameResampler.js";
import { BindingError, ShapeMismatchError, describeLocation } from "./errors.js";

/**
 * Column layout of a track, resolved once from a SkeletonBinding.
 */
export interface JointLayout {
	/** Body joints, then left hand, then right hand */
	readonly jointNames: readonly string[];
	readonly rootJoint: string;
	/** Joint name -> column index */
	readonly columnOf: ReadonlyMap<string, number>;
	readonly bindRootPosition: Readonly<Vec3>;
}

function checkNameList(names: readonly string[], expected: number, field: string): void {
	if (names.length !== expected) {
		throw new BindingError(`${field}: expected ${expected} joint names, got ${names.length}`, { field });
	}
	names.forEach((name, joint) => {
		if (typeof name !== "string" || name.length === 0) {
			throw new BindingError(`${field}[${joint}]: joint name is empty`, { field, joint });
		}
	});
}

/**
 * Validate a binding and build its column layout.
 * @throws BindingError on wrong counts, empty or duplicate names, or a non-finite bind position
 */
export function resolveJointLayout(binding: SkeletonBinding): JointLayout {
	checkNameList(binding.bodyJoints, BODY_JOINT_COUNT, "bodyJoints");
	checkNameList(binding.leftHandJoints, HAND_JOINT_COUNT, "leftHandJoints");
	checkNameList(binding.rightHandJoints, HAND_JOINT_COUNT, "rightHandJoints");

	const bind = binding.bindRootPosition;
	if (bind.length !== 3 || !bind.every((c) => Number.isFinite(c))) {
		throw new BindingError(`bindRootPosition must be 3 finite numbers, got [${bind.join(", ")}]`, {
			field: "bindRootPosition"
		});
	}

	const jointNames = [...binding.bodyJoints, ...binding.leftHandJoints, ...binding.rightHandJoints];
	const columnOf = new Map<string, number>();
	jointNames.forEach((name, column) => {
		if (columnOf.has(name)) {
			throw new BindingError(`Joint "${name}" is bound more than once`, { joint: name });
		}
		columnOf.set(name, column);
	});

	return {
		jointNames: Object.freeze(jointNames),
		rootJoint: binding.bodyJoints[0],
		columnOf,
		bindRootPosition: Object.freeze<Vec3>([bind[0], bind[1], bind[2]])
	};
}

const SAMPLE_LISTS = [
	["body", BODY_JOINT_COUNT],
	["leftHand", HAND_JOINT_COUNT],
	["rightHand", HAND_JOINT_COUNT]
] as const;

/**
 * Check that a sample has 22 body and 15 + 15 hand rotations of 4 components each.
 * @throws ShapeMismatchError naming the sample and list
 */
export function checkSampleShape(sample: PoseSample, recordIndex: number): void {
	for (const [field, expected] of SAMPLE_LISTS) {
		const rotations = sample[field];
		if (rotations.length !== expected) {
			throw new ShapeMismatchError(
				`${describeLocation({ recordIndex, field })}: expected ${expected} rotations, got ${rotations.length}`,
				{ recordIndex, field }
			);
		}
		rotations.forEach((rotation, joint) => {
			if (rotation.length !== 4) {
				const context = { recordIndex, field, joint };
				throw new ShapeMismatchError(
					`${describeLocation(context)}: expected 4 components, got ${rotation.length}`,
					context
				);
			}
		});
	}
}

export interface EmitterTiming {
	/** Effective output rate (frames/second) */
	frameRate: number;
	firstFrame: number;
}

/**
 * Produces one complete TrackFrame per selected sample, in a fixed column order.
 */
export class KeyframeEmitter {
	private readonly _layout: JointLayout;
	private readonly _timing: EmitterTiming;

	constructor(layout: JointLayout, timing: EmitterTiming) {
		this._layout = layout;
		this._timing = timing;
	}

	get layout(): JointLayout {
		return this._layout;
	}

	/**
	 * Build the frame record. The root column receives rootRotation; all other
	 * columns receive copies of the sample's rotations, so edits to a track never reach
	 * the sequence or other tracks built from it.
	 * @throws ShapeMismatchError if the body or either hand does not fill its columns
	 */
	emit(
		selection: FrameSelection,
		sample: PoseSample,
		rootTranslation: Vec3,
		rootRotation: JointRotation
	): TrackFrame {
		checkSampleShape(sample, selection.sourceIndex);

		const rotations: JointRotation[] = [rootRotation];
		for (const list of [sample.body.slice(1), sample.leftHand, sample.rightHand]) {
			for (const rotation of list) rotations.push(Float64Array.from(rotation));
		}

		return {
			frame: selection.frame,
			sourceIndex: selection.sourceIndex,
			time: (selection.frame - this._timing.firstFrame) / this._timing.frameRate,
			rootTranslation,
			rotations
		};
	}
}

// Column maps for tracks looked up through getJointRotation
const _trackColumns = new WeakMap<AnimationTrack, Map<string, number>>();

function columnsOf(track: AnimationTrack): Map<string, number> {
	let columns = _trackColumns.get(track);
	if (!columns) {
		columns = new Map(track.jointNames.map((name, column) => [name, column]));
		_trackColumns.set(track, columns);
	}
	return columns;
}

/**
 * Rotation of a joint at a frame position (0-based index into track.frames).
 * @throws BindingError if the joint is not part of the track
 * @throws RangeError if the frame position is out of range
 */
export function getJointRotation(track: AnimationTrack, position: number, jointName: string): JointRotation {
	const column = columnsOf(track).get(jointName);
	if (column === undefined) {
		throw new BindingError(`Joint "${jointName}" has no keyframes in this track`, { joint: jointName });
	}
	if (!Number.isInteger(position) || position < 0 || position >= track.frames.length) {
		throw new RangeError(`Invalid frame position: ${position}`);
	}
	return track.frames[position].rotations[column];
}
