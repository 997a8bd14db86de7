/** Where in the input an error was detected */
export interface ErrorContext {
	/** Index of the source record (time sample) */
	recordIndex?: number;
	/** Record field or configuration option name */
	field?: string;
	/** Joint index within the field, or joint name */
	joint?: number | string;
	cause?: unknown;
}

/**
 * Base class for every conversion failure. A failed conversion produces no track.
 */
export class PoseConversionError extends Error {
	readonly recordIndex: number | undefined;
	readonly field: string | undefined;
	readonly joint: number | string | undefined;

	constructor(message: string, context: ErrorContext = {}) {
		super(message, context.cause === undefined ? undefined : { cause: context.cause });
		this.name = new.target.name;
		this.recordIndex = context.recordIndex;
		this.field = context.field;
		this.joint = context.joint;
	}
}

/** Non-finite or otherwise unusable rotation vector */
export class NumericError extends PoseConversionError {}

/** Joint-array lengths disagree with the fixed layout (22 body, 15 + 15 hand) */
export class ShapeMismatchError extends PoseConversionError {}

/** Invalid rate or other option, raised before resampling */
export class ConfigurationError extends PoseConversionError {}

/** Skeleton binding is incomplete, duplicated or does not match the target asset */
export class BindingError extends PoseConversionError {}

/** Prefix used in error messages: "record 3, body_pose[20]" */
export function describeLocation(context: ErrorContext): string {
	const parts: string[] = [];
	if (context.recordIndex !== undefined) parts.push(`record ${context.recordIndex}`);
	if (context.field !== undefined) {
		parts.push(context.joint !== undefined ? `${context.field}[${context.joint}]` : context.field);
	}
	return parts.join(", ");
}
