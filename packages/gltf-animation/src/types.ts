import type { Node as GltfNode } from "@gltf-transform/core";

// ============================================================================
// Skeleton Data Types
// ============================================================================

/** Skeleton joint info */
export interface JointData {
	/** Index in the joints array */
	index: number;
	/** Joint name (from glTF node) */
	name: string;
	/** Parent joint index (-1 for root joints) */
	parentIndex: number;
	/** Reference to the glTF node */
	node: GltfNode;
	/** Local bind transform (rest pose), column-major */
	localBindTransform: Float64Array;
}

/** Skin (skeleton) data */
export interface SkinData {
	/** Skin name */
	name: string;
	/** Ordered list of joints in this skin */
	joints: JointData[];
	/** Map from glTF node to joint index for fast lookup */
	nodeToJointIndex: Map<GltfNode, number>;
}

// ============================================================================
// Animation Data Types
// ============================================================================

/** Interpolation mode for animation samplers */
export type AnimationInterpolation = "LINEAR" | "STEP" | "CUBICSPLINE";

/** Animated node property; the writer only emits translation and rotation */
export type AnimationTargetPath = "translation" | "rotation";

/** Single animation sampler (keyframe data) */
export interface AnimationSamplerData {
	/** Keyframe times in seconds */
	input: Float32Array;
	/** Keyframe values (vec3 for translation, quat for rotation) */
	output: Float32Array;
	interpolation: AnimationInterpolation;
}

/** Single animation channel (targets a specific node property) */
export interface AnimationChannelData {
	/** Target node name */
	targetName: string;
	/** Which property to animate */
	targetPath: AnimationTargetPath;
	/** Index into the clip's samplers array */
	samplerIndex: number;
}

/** Complete animation clip */
export interface AnimationClipData {
	/** Animation name */
	name: string;
	/** Duration in seconds (max of all sampler input times) */
	duration: number;
	samplers: AnimationSamplerData[];
	channels: AnimationChannelData[];
}
