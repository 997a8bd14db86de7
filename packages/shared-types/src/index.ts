export type {
	Vec3,
	JointRotation,
	PoseRecord,
	PoseSample,
	PoseSequence,
	SkeletonBinding,
	TrackFrame,
	AnimationTrack
} from "./pose-data.js";
export {
	BODY_JOINT_COUNT,
	HAND_JOINT_COUNT,
	BODY_JOINT_NAMES,
	LHAND_JOINT_NAMES,
	RHAND_JOINT_NAMES,
	ROOT_JOINT_NAME
} from "./smplx-joints.js";
export type { SmplxJointNames } from "./smplx-joints.js";
