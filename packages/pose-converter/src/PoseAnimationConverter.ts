import type {
	AnimationTrack,
	PoseRecord,
	PoseSequence,
	SkeletonBinding,
	TrackFrame
} from "@pose-keyframes/shared-types";
import { createPoseSequence } from "./PoseSampleAssembler.js";
import { resolveFrameRates, selectFrames, type FrameRates } from "./FrameResampler.js";
import { RootMotionResolver } from "./RootMotionResolver.js";
import { correctRootRotation } from "./OrientationCorrector.js";
import { KeyframeEmitter, checkSampleShape, resolveJointLayout, type JointLayout } from "./KeyframeEmitter.js";
import { resolveConversionOptions, type ConversionOptions, type ResolvedConversionOptions } from "./options.js";
import { ShapeMismatchError } from "./errors.js";
import { createDebugLogger } from "./debug.js";

const logger = createDebugLogger("[PoseAnimationConverter]");

/** Raw records, or a sequence that was already assembled */
export type PoseInput = readonly PoseRecord[] | PoseSequence;

/**
 * Converts pose sequences into keyframe tracks for one skeleton binding.
 *
 * Options and the binding are validated in the constructor, so a converter that was
 * constructed can only fail on bad pose input.
 *
 * Usage:
 * ```typescript
 * const converter = new PoseAnimationConverter(binding, { sourceRate: 30, targetRate: 10 });
 * const track = converter.convert(records);
 * ```
 */
export class PoseAnimationConverter {
	private readonly _options: ResolvedConversionOptions;
	private readonly _rates: FrameRates;
	private readonly _layout: JointLayout;

	constructor(binding: SkeletonBinding, options?: ConversionOptions) {
		this._options = resolveConversionOptions(options);
		this._rates = resolveFrameRates(this._options.sourceRate, this._options.targetRate);
		this._layout = resolveJointLayout(binding);

		if (this._rates.effectiveRate !== this._rates.requestedRate) {
			logger.warn(
				`Target rate ${this._rates.requestedRate} exceeds source rate ${this._rates.sourceRate}, ` +
				`using ${this._rates.effectiveRate}`
			);
		}
	}

	get options(): ResolvedConversionOptions {
		return this._options;
	}

	get frameRates(): FrameRates {
		return this._rates;
	}

	get layout(): JointLayout {
		return this._layout;
	}

	/**
	 * Run the whole pipeline. Throws on the first invalid record; no partial track is
	 * ever returned.
	 */
	convert(input: PoseInput): AnimationTrack {
		let sequence: PoseSequence;
		if ("samples" in input) {
			// Assembled elsewhere: every sample must fill the layout before any frame is emitted
			input.samples.forEach((sample, index) => checkSampleShape(sample, index));
			sequence = input;
		} else {
			sequence = createPoseSequence(input);
		}
		const sampleCount = sequence.samples.length;
		if (sampleCount === 0) {
			throw new ShapeMismatchError("Pose sequence is empty");
		}

		const { stride, effectiveRate, sourceRate } = this._rates;
		const { firstFrame, centerOnOrigin } = this._options;

		logger.log(`Number of source poses: ${sampleCount}`);
		logger.log(`Source frames-per-second: ${sourceRate}`);
		logger.log(`Target frames-per-second: ${effectiveRate} (stride ${stride})`);

		const selections = selectFrames(sampleCount, stride, firstFrame);
		const rootMotion = new RootMotionResolver(this._layout.bindRootPosition, centerOnOrigin);
		const emitter = new KeyframeEmitter(this._layout, { frameRate: effectiveRate, firstFrame });

		const frames: TrackFrame[] = [];
		for (const selection of selections) {
			const sample = sequence.samples[selection.sourceIndex];
			const rootTranslation = rootMotion.resolve(sample.translation);
			const rootRotation = correctRootRotation(sample.body[0]);
			frames.push(emitter.emit(selection, sample, rootTranslation, rootRotation));
		}

		logger.log(`Emitted ${frames.length} frame(s), ${firstFrame}..${firstFrame + frames.length - 1}`);

		return {
			jointNames: this._layout.jointNames,
			rootJoint: this._layout.rootJoint,
			sourceRate,
			frameRate: effectiveRate,
			stride,
			firstFrame,
			lastFrame: firstFrame + frames.length - 1,
			frames
		};
	}
}

/**
 * One-shot conversion of records (or an assembled sequence) into an AnimationTrack.
 */
export function convertPoseSequence(
	input: PoseInput,
	binding: SkeletonBinding,
	options?: ConversionOptions
): AnimationTrack {
	return new PoseAnimationConverter(binding, options).convert(input);
}
