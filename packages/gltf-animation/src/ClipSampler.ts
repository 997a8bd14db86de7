import { quat, vec3 } from "gl-matrix";
import type { AnimationSamplerData, AnimationTargetPath } from "./types.js";

/** Components per keyframe value for a target path */
function valueSizeOf(targetPath: AnimationTargetPath): number {
	return targetPath === "rotation" ? 4 : 3;
}

function readValue(values: Float32Array, index: number, size: number): Float64Array | null {
	const offset = index * size;
	if (offset + size > values.length) return null;
	return Float64Array.from(values.subarray(offset, offset + size));
}

/**
 * Sample an animation sampler at a time (seconds).
 * Times before the first or after the last keyframe clamp to that keyframe. STEP holds the
 * previous keyframe; LINEAR uses slerp for rotations and lerp otherwise. CUBICSPLINE is
 * not supported and returns null.
 * @returns The sampled value, or null if the sampler has no usable data
 */
export function sampleChannel(
	sampler: AnimationSamplerData,
	time: number,
	targetPath: AnimationTargetPath
): Float64Array | null {
	const times = sampler.input;
	const values = sampler.output;
	if (times.length === 0 || sampler.interpolation === "CUBICSPLINE") return null;

	const valueSize = valueSizeOf(targetPath);

	// Handle edge cases: before first or after last keyframe
	if (time <= times[0]) {
		return readValue(values, 0, valueSize);
	}
	if (time >= times[times.length - 1]) {
		return readValue(values, times.length - 1, valueSize);
	}

	// Keyframe interval by binary search
	let lo = 0;
	let hi = times.length - 1;
	while (hi - lo > 1) {
		const mid = (lo + hi) >> 1;
		if (times[mid] <= time) lo = mid;
		else hi = mid;
	}

	const v0 = readValue(values, lo, valueSize);
	const v1 = readValue(values, hi, valueSize);
	if (!v0 || !v1) return null;

	if (sampler.interpolation === "STEP") {
		return v0;
	}

	const factor = (time - times[lo]) / (times[hi] - times[lo]);
	if (valueSize === 4) {
		quat.slerp(v0, v0, v1, factor);
	} else {
		vec3.lerp(v0, v0, v1, factor);
	}
	return v0;
}
