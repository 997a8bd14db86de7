import { ConfigurationError } from "./errors.js";

/** Options for a pose-to-animation conversion */
export interface ConversionOptions {
	/** Source sampling rate in frames/second. Default: 30 */
	sourceRate?: number;
	/** Requested output rate in frames/second, clamped to sourceRate. Default: 30 */
	targetRate?: number;
	/** Subtract the first frame's horizontal translation from every frame. Default: true */
	centerOnOrigin?: boolean;
	/** Frame number given to the first output frame. Default: 1 */
	firstFrame?: number;
}

export type ResolvedConversionOptions = Readonly<Required<ConversionOptions>>;

export const DEFAULT_CONVERSION_OPTIONS: ResolvedConversionOptions = Object.freeze({
	sourceRate: 30,
	targetRate: 30,
	centerOnOrigin: true,
	firstFrame: 1
});

/**
 * Fill in defaults and check field types. Rate values are checked by resolveFrameRates.
 */
export function resolveConversionOptions(options: ConversionOptions = {}): ResolvedConversionOptions {
	const resolved = {
		sourceRate: options.sourceRate ?? DEFAULT_CONVERSION_OPTIONS.sourceRate,
		targetRate: options.targetRate ?? DEFAULT_CONVERSION_OPTIONS.targetRate,
		centerOnOrigin: options.centerOnOrigin ?? DEFAULT_CONVERSION_OPTIONS.centerOnOrigin,
		firstFrame: options.firstFrame ?? DEFAULT_CONVERSION_OPTIONS.firstFrame
	};

	if (typeof resolved.centerOnOrigin !== "boolean") {
		throw new ConfigurationError(`centerOnOrigin must be a boolean, got ${String(resolved.centerOnOrigin)}`, {
			field: "centerOnOrigin"
		});
	}
	if (!Number.isInteger(resolved.firstFrame) || resolved.firstFrame < 0) {
		throw new ConfigurationError(`firstFrame must be a non-negative integer, got ${resolved.firstFrame}`, {
			field: "firstFrame"
		});
	}

	return Object.freeze(resolved);
}
