/**
 * Shared interfaces for pose input, skeleton binding and keyframe output
 */

/** Plain 3-component vector [x, y, z] */
export type Vec3 = [number, number, number];

/**
 * Unit quaternion for one joint at one sample, [x, y, z, w].
 * Stored in double precision; glTF export narrows to Float32.
 */
export type JointRotation = Float64Array;

/**
 * Decoded source record for one time sample of the body model.
 * All rotations are axis-angle vectors in radians.
 */
export interface PoseRecord {
    /** Root (pelvis) orientation, exactly one vector */
    globalOrient: Vec3[];
    /** Body joint rotations in body-joint order, 21 vectors */
    bodyPose: Vec3[];
    /** Left hand rotations in hand-joint order, 15 vectors */
    leftHandPose: Vec3[];
    /** Right hand rotations in hand-joint order, 15 vectors */
    rightHandPose: Vec3[];
    /** Root translation in model units */
    transl: Vec3;
}

/**
 * One assembled sample. Frozen once created.
 */
export interface PoseSample {
    /** 22 rotations: global orientation followed by the 21 body joints */
    readonly body: readonly JointRotation[];
    /** 15 left hand rotations (coordinate fix applied) */
    readonly leftHand: readonly JointRotation[];
    /** 15 right hand rotations (coordinate fix applied) */
    readonly rightHand: readonly JointRotation[];
    /** Root translation, unchanged from the record */
    readonly translation: Readonly<Vec3>;
}

/** Ordered, structurally homogeneous list of samples */
export interface PoseSequence {
    readonly samples: readonly PoseSample[];
}

/**
 * Target skeleton description supplied by the asset loader.
 * Names are positional: index i of bodyJoints receives body rotation i.
 */
export interface SkeletonBinding {
    /** 22 body joint names, index 0 = root (pelvis) */
    bodyJoints: readonly string[];
    /** 15 left hand joint names */
    leftHandJoints: readonly string[];
    /** 15 right hand joint names */
    rightHandJoints: readonly string[];
    /** Bind-pose root position relative to the skeleton origin, in skeleton units */
    bindRootPosition: Readonly<Vec3>;
}

/** One output frame; rotations are aligned with AnimationTrack.jointNames */
export interface TrackFrame {
    /** Frame number in the target timeline */
    frame: number;
    /** Index of the source sample this frame was taken from */
    sourceIndex: number;
    /** Seconds since the first frame at the effective frame rate */
    time: number;
    /** Root joint local translation */
    rootTranslation: Vec3;
    /** One rotation per joint column */
    rotations: JointRotation[];
}

/**
 * Keyframed animation clip, column-oriented by joint name.
 */
export interface AnimationTrack {
    /** Column order: body joints, then left hand, then right hand */
    jointNames: readonly string[];
    /** Name of the only joint that carries translation */
    rootJoint: string;
    /** Source sampling rate (frames/second) */
    sourceRate: number;
    /** Effective output rate after clamping to the source rate */
    frameRate: number;
    /** Step between selected source samples */
    stride: number;
    /** Frame number of frames[0] */
    firstFrame: number;
    /** Frame number of the last frame */
    lastFrame: number;
    frames: TrackFrame[];
}
