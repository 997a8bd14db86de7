export {
	getLocalMatrix,
	extractSkins,
	getSkeletonSpaceMatrix,
	bindingFromDocument,
	readSkeletonBinding
} from "./SkeletonBindingLoader.js";
export { writeAnimationTrack, assertExportPath, exportAnimation } from "./AnimationTrackWriter.js";
export { extractAnimations, findChannel } from "./AnimationClipReader.js";
export { sampleChannel } from "./ClipSampler.js";

export type { BindingLoadOptions } from "./SkeletonBindingLoader.js";
export type { AnimationWriteOptions, AnimationWriteResult } from "./AnimationTrackWriter.js";
export type {
	JointData,
	SkinData,
	AnimationInterpolation,
	AnimationTargetPath,
	AnimationSamplerData,
	AnimationChannelData,
	AnimationClipData
} from "./types.js";
