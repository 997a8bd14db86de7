import type { Animation, AnimationSampler, Root } from "@gltf-transform/core";
import { createDebugLogger } from "@pose-keyframes/pose-converter";
import type {
	AnimationChannelData,
	AnimationClipData,
	AnimationInterpolation,
	AnimationSamplerData,
	AnimationTargetPath
} from "./types.js";

const logger = createDebugLogger("[AnimationClipReader]");

const TARGET_PATHS: readonly AnimationTargetPath[] = ["translation", "rotation"];
const INTERPOLATIONS: readonly AnimationInterpolation[] = ["LINEAR", "STEP", "CUBICSPLINE"];

function toTargetPath(path: string | null): AnimationTargetPath | null {
	return TARGET_PATHS.find((p) => p === path) ?? null;
}

function toInterpolation(mode: string | null): AnimationInterpolation {
	return INTERPOLATIONS.find((m) => m === mode) ?? "LINEAR";
}

function toFloat32(array: ArrayLike<number> | null): Float32Array {
	if (array instanceof Float32Array) return array;
	return new Float32Array(array ?? []);
}

/**
 * Extract all animations from the document root.
 * Channels targeting scale or morph weights are skipped.
 */
export function extractAnimations(root: Root): AnimationClipData[] {
	const animList = root.listAnimations();
	logger.log(`Found ${animList.length} animation(s) in document`);

	return animList.map((anim) => {
		const clip = extractSingleAnimation(anim);
		logger.log(`Animation "${clip.name}": ${clip.duration.toFixed(2)}s, ${clip.channels.length} channels`);
		return clip;
	});
}

function extractSingleAnimation(anim: Animation): AnimationClipData {
	const name = anim.getName() || "(unnamed animation)";
	const gltfSamplers = anim.listSamplers();
	const samplerIndexMap = new Map<AnimationSampler, number>();
	gltfSamplers.forEach((sampler, i) => samplerIndexMap.set(sampler, i));

	let duration = 0;
	const samplers = gltfSamplers.map((gltfSampler): AnimationSamplerData => {
		const inputAccessor = gltfSampler.getInput();
		const outputAccessor = gltfSampler.getOutput();
		if (!inputAccessor || !outputAccessor) {
			logger.warn(`Animation "${name}": Sampler missing input or output accessor`);
			return { input: new Float32Array(0), output: new Float32Array(0), interpolation: "LINEAR" };
		}

		const input = toFloat32(inputAccessor.getArray());
		const output = toFloat32(outputAccessor.getArray());
		if (input.length > 0) {
			duration = Math.max(duration, input[input.length - 1]);
		}
		return { input, output, interpolation: toInterpolation(gltfSampler.getInterpolation()) };
	});

	const channels: AnimationChannelData[] = [];
	for (const gltfChannel of anim.listChannels()) {
		const targetNode = gltfChannel.getTargetNode();
		const targetPath = toTargetPath(gltfChannel.getTargetPath());
		const sampler = gltfChannel.getSampler();

		if (!targetNode || !sampler || !targetPath) {
			logger.warn(`Animation "${name}": Skipping channel without node, sampler or supported path`);
			continue;
		}

		const samplerIndex = samplerIndexMap.get(sampler);
		if (samplerIndex === undefined) {
			logger.warn(`Animation "${name}": Channel references unknown sampler`);
			continue;
		}

		channels.push({
			targetName: targetNode.getName(),
			targetPath,
			samplerIndex
		});
	}

	return { name, duration, samplers, channels };
}

/**
 * Find the channel animating a node property, by node name.
 */
export function findChannel(
	clip: AnimationClipData,
	targetName: string,
	targetPath: AnimationTargetPath
): { channel: AnimationChannelData; sampler: AnimationSamplerData } | null {
	const channel = clip.channels.find((c) => c.targetName === targetName && c.targetPath === targetPath);
	if (!channel) return null;
	const sampler = clip.samplers[channel.samplerIndex];
	return sampler ? { channel, sampler } : null;
}
