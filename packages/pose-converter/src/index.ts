export {
	ZERO_ANGLE_EPSILON,
	createJointRotation,
	rotationVectorToQuat,
	rotationVectorsToQuats,
	quatToRotationVector
} from "./RotationConverter.js";
export {
	HAND_COORDINATE_FIX,
	RECORD_FIELDS,
	EXPECTED_JOINT_COUNTS,
	validatePoseRecord,
	assemblePoseSample,
	createPoseSequence
} from "./PoseSampleAssembler.js";
export { resolveFrameRates, selectFrames, outputFrameCount } from "./FrameResampler.js";
export { RootMotionResolver } from "./RootMotionResolver.js";
export { ROOT_CORRECTION, correctRootRotation } from "./OrientationCorrector.js";
export { KeyframeEmitter, resolveJointLayout, checkSampleShape, getJointRotation } from "./KeyframeEmitter.js";
export { PoseAnimationConverter, convertPoseSequence } from "./PoseAnimationConverter.js";
export { DEFAULT_CONVERSION_OPTIONS, resolveConversionOptions } from "./options.js";
export { poseRecordSchema, parsePoseRecord, decodeNpz, loadPoseRecords } from "./records.js";
export {
	PoseConversionError,
	NumericError,
	ShapeMismatchError,
	ConfigurationError,
	BindingError,
	describeLocation
} from "./errors.js";
export { setDebugLogging, isDebugLogging, createDebugLogger } from "./debug.js";

export type { FrameRates, FrameSelection } from "./FrameResampler.js";
export type { JointLayout, EmitterTiming } from "./KeyframeEmitter.js";
export type { PoseInput } from "./PoseAnimationConverter.js";
export type { ConversionOptions, ResolvedConversionOptions } from "./options.js";
export type { ErrorContext } from "./errors.js";
export type { DebugLogger } from "./debug.js";
