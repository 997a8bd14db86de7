import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
	Accessor,
	NodeIO,
	type Animation,
	type Buffer as GltfBuffer,
	type Document,
	type Node as GltfNodeDef
} from "@gltf-transform/core";
import { quat, vec3 } from "gl-matrix";
import type { AnimationTrack } from "@pose-keyframes/shared-types";
import { BindingError, ConfigurationError, createDebugLogger } from "@pose-keyframes/pose-converter";
import { extractSkins } from "./SkeletonBindingLoader.js";

const logger = createDebugLogger("[AnimationTrackWriter]");

/** Options for writing a track into a glTF document */
export interface AnimationWriteOptions {
	/** Animation name. Default: "pose-animation" */
	name?: string;
	/** Sampler interpolation. Default: "LINEAR" */
	interpolation?: "LINEAR" | "STEP";
}

/** Summary of a written animation */
export interface AnimationWriteResult {
	animation: Animation;
	frameCount: number;
	channelCount: number;
	/** Seconds */
	duration: number;
}

const DEFAULT_ANIMATION_NAME = "pose-animation";

/** Output formats NodeIO can write */
const SUPPORTED_EXTENSIONS = [".glb", ".gltf"];

/**
 * Map track joint names to nodes, preferring skin joints over other nodes of the same name.
 */
function resolveTargetNodes(document: Document, jointNames: readonly string[]): GltfNodeDef[] {
	const root = document.getRoot();
	const byName = new Map<string, GltfNodeDef>();
	for (const node of root.listNodes()) {
		if (!byName.has(node.getName())) byName.set(node.getName(), node);
	}
	for (const skin of extractSkins(root)) {
		for (const joint of skin.joints) byName.set(joint.name, joint.node);
	}

	const nodes: GltfNodeDef[] = [];
	const missing: string[] = [];
	for (const name of jointNames) {
		const node = byName.get(name);
		if (node) nodes.push(node);
		else missing.push(name);
	}
	if (missing.length > 0) {
		throw new BindingError(`Document has no node for ${missing.length} joint(s): ${missing.join(", ")}`, {
			joint: missing[0]
		});
	}
	return nodes;
}

function getOrCreateBuffer(document: Document): GltfBuffer {
	return document.getRoot().listBuffers()[0] ?? document.createBuffer();
}

/**
 * Add the track to the document as one glTF animation.
 *
 * Track rotations and the root translation are relative to the bind pose, so each joint's
 * rotation is composed with its node's rest rotation, and the root offset is rotated into
 * the root's rest frame and added to its rest translation. Times are
 * (frame − firstFrame) / frameRate.
 *
 * @throws BindingError if a joint has no node in the document
 */
export function writeAnimationTrack(
	document: Document,
	track: AnimationTrack,
	options: AnimationWriteOptions = {}
): AnimationWriteResult {
	const name = options.name ?? DEFAULT_ANIMATION_NAME;
	const interpolation = options.interpolation ?? "LINEAR";
	const frameCount = track.frames.length;
	if (frameCount === 0) {
		throw new ConfigurationError("Track has no frames", { field: "frames" });
	}

	const nodes = resolveTargetNodes(document, track.jointNames);
	const buffer = getOrCreateBuffer(document);
	const animation = document.createAnimation(name);

	const times = new Float32Array(frameCount);
	track.frames.forEach((frame, i) => {
		times[i] = frame.time;
	});
	const input = document
		.createAccessor(`${name}_time`)
		.setType(Accessor.Type.SCALAR)
		.setArray(times)
		.setBuffer(buffer);

	const composed = new Float64Array(4);
	nodes.forEach((node, column) => {
		const restRotation = node.getRotation();
		const values = new Float32Array(frameCount * 4);
		track.frames.forEach((frame, i) => {
			quat.multiply(composed, restRotation, frame.rotations[column]);
			quat.normalize(composed, composed);
			values.set(composed, i * 4);
		});

		const output = document
			.createAccessor(`${name}_${track.jointNames[column]}_rotation`)
			.setType(Accessor.Type.VEC4)
			.setArray(values)
			.setBuffer(buffer);
		const sampler = document
			.createAnimationSampler()
			.setInput(input)
			.setOutput(output)
			.setInterpolation(interpolation);
		const channel = document
			.createAnimationChannel()
			.setTargetNode(node)
			.setTargetPath("rotation")
			.setSampler(sampler);
		animation.addSampler(sampler).addChannel(channel);
	});

	// Root translation channel
	const rootColumn = track.jointNames.indexOf(track.rootJoint);
	const rootNode = nodes[rootColumn];
	const restTranslation = rootNode.getTranslation();
	const restRotation = rootNode.getRotation();
	const offset = new Float64Array(3);
	const positions = new Float32Array(frameCount * 3);
	track.frames.forEach((frame, i) => {
		vec3.transformQuat(offset, frame.rootTranslation, restRotation);
		vec3.add(offset, offset, restTranslation);
		positions.set(offset, i * 3);
	});
	const translationOutput = document
		.createAccessor(`${name}_${track.rootJoint}_translation`)
		.setType(Accessor.Type.VEC3)
		.setArray(positions)
		.setBuffer(buffer);
	const translationSampler = document
		.createAnimationSampler()
		.setInput(input)
		.setOutput(translationOutput)
		.setInterpolation(interpolation);
	animation
		.addSampler(translationSampler)
		.addChannel(
			document
				.createAnimationChannel()
				.setTargetNode(rootNode)
				.setTargetPath("translation")
				.setSampler(translationSampler)
		);

	const duration = times[frameCount - 1];
	const channelCount = animation.listChannels().length;
	logger.log(`Animation "${name}": ${frameCount} frames, ${channelCount} channels, ${duration.toFixed(2)}s`);

	return { animation, frameCount, channelCount, duration };
}

/**
 * Check that a path ends in a format the exporter can write.
 * @throws ConfigurationError otherwise
 */
export function assertExportPath(outputPath: string): void {
	const lower = outputPath.toLowerCase();
	if (!SUPPORTED_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
		throw new ConfigurationError(
			`Unsupported export format: ${outputPath} (must be ${SUPPORTED_EXTENSIONS.join(" or ")})`,
			{ field: "outputPath" }
		);
	}
}

/**
 * Load a rigged template, add the track as an animation and write the result.
 * The output directory is created if needed.
 */
export async function exportAnimation(
	templatePath: string,
	outputPath: string,
	track: AnimationTrack,
	options?: AnimationWriteOptions
): Promise<Omit<AnimationWriteResult, "animation">> {
	assertExportPath(outputPath);

	const io = new NodeIO();
	const document = await io.read(templatePath);
	const { frameCount, channelCount, duration } = writeAnimationTrack(document, track, options);

	await mkdir(dirname(outputPath), { recursive: true });
	await io.write(outputPath, document);
	logger.log(`Exported ${frameCount} frames to ${outputPath}`);

	return { frameCount, channelCount, duration };
}
