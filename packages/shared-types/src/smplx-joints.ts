import { readFileSync } from "node:fs";
import { z } from "zod";

export const BODY_JOINT_COUNT = 22;
export const HAND_JOINT_COUNT = 15;

const jointNameListSchema = z.object({
	body: z.array(z.string().min(1)).length(BODY_JOINT_COUNT),
	leftHand: z.array(z.string().min(1)).length(HAND_JOINT_COUNT),
	rightHand: z.array(z.string().min(1)).length(HAND_JOINT_COUNT)
});

export type SmplxJointNames = z.infer<typeof jointNameListSchema>;

function loadJointNames(): SmplxJointNames {
	const url = new URL("../data/smplx-joints.json", import.meta.url);
	return jointNameListSchema.parse(JSON.parse(readFileSync(url, "utf8")));
}

const names = loadJointNames();

/** SMPL-X body joints, pelvis first (matches global_orient + body_pose order) */
export const BODY_JOINT_NAMES: readonly string[] = Object.freeze(names.body);

/** SMPL-X left hand joints: index, middle, pinky, ring, thumb (3 each) */
export const LHAND_JOINT_NAMES: readonly string[] = Object.freeze(names.leftHand);

export const RHAND_JOINT_NAMES: readonly string[] = Object.freeze(names.rightHand);

/** Root joint of the SMPL-X skeleton */
export const ROOT_JOINT_NAME = BODY_JOINT_NAMES[0];
