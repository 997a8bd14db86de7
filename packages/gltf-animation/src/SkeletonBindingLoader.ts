import { NodeIO, type Document, type Node as GltfNodeDef, type Root, type Skin } from "@gltf-transform/core";
import { mat4 } from "gl-matrix";
import {
	BODY_JOINT_NAMES,
	LHAND_JOINT_NAMES,
	RHAND_JOINT_NAMES,
	type SkeletonBinding,
	type SmplxJointNames,
	type Vec3
} from "@pose-keyframes/shared-types";
import { BindingError, createDebugLogger } from "@pose-keyframes/pose-converter";
import type { JointData, SkinData } from "./types.js";

const logger = createDebugLogger("[SkeletonBindingLoader]");

/** Options for resolving a SkeletonBinding from a rigged template */
export interface BindingLoadOptions {
	/** Skin to bind against. Default: the first skin in the document */
	skinName?: string;
	/** Joint names to resolve. Default: the SMPL-X joint lists */
	jointNames?: SmplxJointNames;
	/** Prefix prepended to every joint name (e.g. "m_avg_" for gendered rigs) */
	jointPrefix?: string;
}

/**
 * Local TRS matrix of a node (column-major).
 */
export function getLocalMatrix(node: GltfNodeDef): Float64Array {
	const t = node.getTranslation();
	const r = node.getRotation();
	const s = node.getScale();

	const result = new Float64Array(16);
	mat4.fromRotationTranslationScale(result, r, t, s);
	return result;
}

/**
 * Extract all skins from the document root.
 */
export function extractSkins(root: Root): SkinData[] {
	const skinList = root.listSkins();
	logger.log(`Found ${skinList.length} skin(s) in document`);

	return skinList.map((skin, skinIndex) => {
		const skinData = extractSingleSkin(skin);
		logger.log(`Skin ${skinIndex} "${skinData.name}": ${skinData.joints.length} joints`);
		return skinData;
	});
}

function extractSingleSkin(skin: Skin): SkinData {
	const name = skin.getName() || "(unnamed skin)";
	const jointNodes = skin.listJoints();
	const nodeToJointIndex = new Map<GltfNodeDef, number>();

	jointNodes.forEach((node, i) => nodeToJointIndex.set(node, i));

	// Second pass: parent indices (-1 if the parent is not a joint of this skin)
	const joints: JointData[] = jointNodes.map((node, i) => {
		const parent = node.getParentNode();
		const parentIndex = parent ? nodeToJointIndex.get(parent) ?? -1 : -1;
		return {
			index: i,
			name: node.getName() || `joint_${i}`,
			parentIndex,
			node,
			localBindTransform: getLocalMatrix(node)
		};
	});

	return { name, joints, nodeToJointIndex };
}

/**
 * Bind transform of a joint relative to the skeleton origin (the parent space of the
 * topmost joint), composed from local bind transforms.
 */
export function getSkeletonSpaceMatrix(skin: SkinData, jointIndex: number): Float64Array {
	const result = new Float64Array(16);
	mat4.identity(result);

	let index = jointIndex;
	while (index >= 0) {
		const joint = skin.joints[index];
		mat4.multiply(result, joint.localBindTransform, result);
		index = joint.parentIndex;
	}
	return result;
}

function selectSkin(skins: SkinData[], skinName?: string): SkinData {
	if (skins.length === 0) {
		throw new BindingError("Template has no skins");
	}
	if (skinName === undefined) return skins[0];

	const skin = skins.find((s) => s.name === skinName);
	if (!skin) {
		const available = skins.map((s) => `"${s.name}"`).join(", ");
		throw new BindingError(`Skin "${skinName}" not found (available: ${available})`, { field: "skinName" });
	}
	return skin;
}

/**
 * Resolve a SkeletonBinding against a skin of a loaded template document.
 * @throws BindingError if the skin is missing or any joint name is not one of its joints
 */
export function bindingFromDocument(document: Document, options: BindingLoadOptions = {}): SkeletonBinding {
	const skin = selectSkin(extractSkins(document.getRoot()), options.skinName);
	const prefix = options.jointPrefix ?? "";
	const names = options.jointNames ?? {
		body: [...BODY_JOINT_NAMES],
		leftHand: [...LHAND_JOINT_NAMES],
		rightHand: [...RHAND_JOINT_NAMES]
	};

	const bodyJoints = names.body.map((n) => prefix + n);
	const leftHandJoints = names.leftHand.map((n) => prefix + n);
	const rightHandJoints = names.rightHand.map((n) => prefix + n);

	const jointIndexByName = new Map(skin.joints.map((j) => [j.name, j.index]));
	const missing = [...bodyJoints, ...leftHandJoints, ...rightHandJoints].filter((n) => !jointIndexByName.has(n));
	if (missing.length > 0) {
		throw new BindingError(
			`Skin "${skin.name}" is missing ${missing.length} joint(s): ${missing.join(", ")}`,
			{ joint: missing[0] }
		);
	}

	const rootIndex = jointIndexByName.get(bodyJoints[0]) ?? -1;
	const rootMatrix = getSkeletonSpaceMatrix(skin, rootIndex);
	const bindRootPosition: Vec3 = [0, 0, 0];
	mat4.getTranslation(bindRootPosition, rootMatrix);

	logger.log(
		`Bound ${bodyJoints.length + leftHandJoints.length + rightHandJoints.length} joints on skin "${skin.name}", ` +
		`root "${bodyJoints[0]}" at (${bindRootPosition.map((c) => c.toFixed(4)).join(", ")})`
	);

	return { bodyJoints, leftHandJoints, rightHandJoints, bindRootPosition };
}

/**
 * Read a rigged glTF/GLB template from disk and resolve its binding.
 */
export async function readSkeletonBinding(path: string, options?: BindingLoadOptions): Promise<SkeletonBinding> {
	const io = new NodeIO();
	const document = await io.read(path);
	return bindingFromDocument(document, options);
}
