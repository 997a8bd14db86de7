import { ConfigurationError } from "./errors.js";

/** Rates after clamping, and the resulting stride */
export interface FrameRates {
	sourceRate: number;
	/** Rate that was asked for */
	requestedRate: number;
	/** min(requestedRate, sourceRate) */
	effectiveRate: number;
	/** Source samples advanced per output frame, at least 1 */
	stride: number;
}

/** One selected source sample and the output frame it becomes */
export interface FrameSelection {
	/** Position in the output track (0-based) */
	position: number;
	sourceIndex: number;
	frame: number;
}

function checkRate(value: number, field: string): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigurationError(`${field} must be a positive integer (frames/second), got ${value}`, { field });
	}
}

/**
 * Clamp the target rate to the source rate (never upsample) and derive the stride.
 * @throws ConfigurationError for a non-positive or non-integer rate
 */
export function resolveFrameRates(sourceRate: number, targetRate: number): FrameRates {
	checkRate(sourceRate, "sourceRate");
	checkRate(targetRate, "targetRate");

	const effectiveRate = Math.min(targetRate, sourceRate);
	const stride = Math.max(1, Math.floor(sourceRate / effectiveRate));
	return { sourceRate, requestedRate: targetRate, effectiveRate, stride };
}

/**
 * Pick source indices 0, s, 2s, … below sampleCount and number them consecutively
 * from firstFrame. Yields ⌈sampleCount / stride⌉ selections.
 */
export function selectFrames(sampleCount: number, stride: number, firstFrame: number = 1): FrameSelection[] {
	if (!Number.isInteger(stride) || stride < 1) {
		throw new ConfigurationError(`stride must be a positive integer, got ${stride}`, { field: "stride" });
	}

	const selections: FrameSelection[] = [];
	for (let sourceIndex = 0; sourceIndex < sampleCount; sourceIndex += stride) {
		const position = selections.length;
		selections.push({ position, sourceIndex, frame: firstFrame + position });
	}
	return selections;
}

/** Number of output frames for a sequence of sampleCount samples */
export function outputFrameCount(sampleCount: number, stride: number): number {
	return Math.ceil(sampleCount / stride);
}
