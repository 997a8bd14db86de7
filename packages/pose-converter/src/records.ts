import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { unzipSync } from "fflate";
import NpyParser from "npyjs";
import { z } from "zod";
import type { PoseRecord, Vec3 } from "@pose-keyframes/shared-types";
import { ShapeMismatchError } from "./errors.js";
import { createDebugLogger } from "./debug.js";

const logger = createDebugLogger("[PoseRecords]");

const vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

function chunkVectors(flat: number[]): Vec3[] {
	const vectors: Vec3[] = [];
	for (let i = 0; i < flat.length; i += 3) {
		vectors.push([flat[i], flat[i + 1], flat[i + 2]]);
	}
	return vectors;
}

const flatVectorsSchema = z
	.array(z.number())
	.refine((values) => values.length % 3 === 0, { message: "flat rotation array length must be a multiple of 3" })
	.transform(chunkVectors);

// N×3, flat 3N, or either with a leading batch dimension of 1
const vectorListSchema = z.union([
	z.array(vec3Schema),
	flatVectorsSchema,
	z.tuple([z.array(vec3Schema)]).transform(([inner]) => inner),
	z.tuple([flatVectorsSchema]).transform(([inner]) => inner)
]);

const translationSchema = z.union([
	vec3Schema,
	z.tuple([vec3Schema]).transform(([inner]) => inner)
]);

/** Per-sample record as written by the body-model fitter (extra keys are ignored) */
export const poseRecordSchema = z
	.object({
		global_orient: vectorListSchema,
		body_pose: vectorListSchema,
		left_hand_pose: vectorListSchema,
		right_hand_pose: vectorListSchema,
		transl: translationSchema
	})
	.transform((raw): PoseRecord => ({
		globalOrient: raw.global_orient,
		bodyPose: raw.body_pose,
		leftHandPose: raw.left_hand_pose,
		rightHandPose: raw.right_hand_pose,
		transl: raw.transl
	}));

/**
 * Decode one untyped record. Joint counts are checked later by validatePoseRecord.
 * @param source Optional label (file name) for error messages
 * @throws ShapeMismatchError if a field is missing or not a rotation array
 */
export function parsePoseRecord(json: unknown, recordIndex: number = 0, source?: string): PoseRecord {
	const result = poseRecordSchema.safeParse(json);
	if (!result.success) {
		const issue = result.error.issues[0];
		const path = issue.path.join(".");
		const where = source ? `record ${recordIndex} (${source})` : `record ${recordIndex}`;
		throw new ShapeMismatchError(`${where}: ${path || "record"}: ${issue.message}`, {
			recordIndex,
			field: issue.path.length > 0 ? String(issue.path[0]) : undefined,
			cause: result.error
		});
	}
	return result.data;
}

/**
 * Decode the arrays of a NumPy .npz archive (stored or deflated) into flat,
 * row-major number lists keyed by array name.
 */
export function decodeNpz(bytes: Uint8Array): Record<string, number[]> {
	const entries = unzipSync(bytes);
	const parser = new NpyParser();
	const arrays: Record<string, number[]> = {};

	for (const [entryName, entry] of Object.entries(entries)) {
		if (!entryName.endsWith(".npy")) continue;

		const buffer = new ArrayBuffer(entry.byteLength);
		new Uint8Array(buffer).set(entry);
		const parsed = parser.parse(buffer);

		const values: number[] = [];
		for (let i = 0; i < parsed.data.length; i++) values.push(Number(parsed.data[i]));
		arrays[entryName.slice(0, -".npy".length)] =
			parsed.fortranOrder && parsed.shape.length === 2 ? transpose(values, parsed.shape[0], parsed.shape[1]) : values;
	}
	return arrays;
}

// Column-major rows × cols -> row-major
function transpose(values: number[], rows: number, cols: number): number[] {
	const out = new Array<number>(values.length);
	for (let r = 0; r < rows; r++) {
		for (let c = 0; c < cols; c++) out[r * cols + c] = values[c * rows + r];
	}
	return out;
}

const RECORD_EXTENSIONS = [".json", ".npz"];

async function readRecordFile(dir: string, fileName: string, recordIndex: number): Promise<unknown> {
	const path = join(dir, fileName);
	if (fileName.endsWith(".npz")) {
		try {
			return decodeNpz(await readFile(path));
		} catch (err) {
			throw new ShapeMismatchError(`record ${recordIndex} (${fileName}): invalid .npz archive`, {
				recordIndex,
				cause: err
			});
		}
	}

	const text = await readFile(path, "utf8");
	try {
		return JSON.parse(text);
	} catch (err) {
		throw new ShapeMismatchError(`record ${recordIndex} (${fileName}): invalid JSON`, {
			recordIndex,
			cause: err
		});
	}
}

/**
 * Load every *.json and *.npz record in a directory, in file-name order.
 * .npz archives hold one .npy array per record field, as the body-model fitter saves them.
 */
export async function loadPoseRecords(dir: string): Promise<PoseRecord[]> {
	const fileNames = (await readdir(dir))
		.filter((name) => RECORD_EXTENSIONS.some((ext) => name.endsWith(ext)))
		.sort();
	logger.log(`Loading ${fileNames.length} record file(s) from ${dir}`);

	const records: PoseRecord[] = [];
	for (const fileName of fileNames) {
		const recordIndex = records.length;
		const json = await readRecordFile(dir, fileName, recordIndex);
		records.push(parsePoseRecord(json, recordIndex, fileName));
	}
	return records;
}
