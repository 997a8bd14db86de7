import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { zipSync } from "fflate";
import type { PoseRecord } from "@pose-keyframes/shared-types";
import { ShapeMismatchError, createPoseSequence, decodeNpz, loadPoseRecords, parsePoseRecord } from "../src/index.js";
import { swayingRecords, thrown } from "./fixtures.js";

function toJson(record: PoseRecord): Record<string, unknown> {
	return {
		global_orient: record.globalOrient,
		body_pose: record.bodyPose,
		left_hand_pose: record.leftHandPose,
		right_hand_pose: record.rightHandPose,
		transl: record.transl
	};
}

/** NumPy .npy v1.0 bytes for a little-endian float64 array */
function npy(shape: number[], values: number[], fortranOrder = false): Uint8Array {
	const shapeText = shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(", ")})`;
	let header = `{'descr': '<f8', 'fortran_order': ${fortranOrder ? "True" : "False"}, 'shape': ${shapeText}, }`;
	header += " ".repeat((64 - ((10 + header.length + 1) % 64)) % 64) + "\n";

	const bytes = new Uint8Array(10 + header.length + values.length * 8);
	bytes.set([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, 1, 0]);
	const view = new DataView(bytes.buffer);
	view.setUint16(8, header.length, true);
	bytes.set(new TextEncoder().encode(header), 10);
	values.forEach((v, i) => view.setFloat64(10 + header.length + i * 8, v, true));
	return bytes;
}

/** Record as the body-model fitter saves it: one (1, 3N) array per field */
function toNpz(record: PoseRecord, level: 0 | 6 = 6): Uint8Array {
	const row = (vectors: number[][]): Uint8Array => npy([1, vectors.length * 3], vectors.flat());
	return zipSync(
		{
			"global_orient.npy": row(record.globalOrient),
			"body_pose.npy": row(record.bodyPose),
			"left_hand_pose.npy": row(record.leftHandPose),
			"right_hand_pose.npy": row(record.rightHandPose),
			"transl.npy": npy([1, 3], record.transl)
		},
		{ level }
	);
}

function flat(count: number, value: number): number[] {
	return new Array<number>(count * 3).fill(value);
}

describe("parsePoseRecord", () => {
	it("reads nested N×3 arrays", () => {
		const record = swayingRecords(1)[0];

		expect(parsePoseRecord(toJson(record))).toEqual(record);
	});

	it("reads flat and batched arrays", () => {
		const record = parsePoseRecord({
			global_orient: [[0.1, 0.2, 0.3]],
			body_pose: [flat(21, 0.5)],
			left_hand_pose: flat(15, 0),
			right_hand_pose: [Array.from({ length: 15 }, () => [0, 0, 1])],
			transl: [[1, 2, 3]],
			betas: [0, 0]
		});

		expect(record.globalOrient).toEqual([[0.1, 0.2, 0.3]]);
		expect(record.bodyPose).toHaveLength(21);
		expect(record.bodyPose[20]).toEqual([0.5, 0.5, 0.5]);
		expect(record.leftHandPose).toHaveLength(15);
		expect(record.rightHandPose[14]).toEqual([0, 0, 1]);
		expect(record.transl).toEqual([1, 2, 3]);
	});

	it("reads a flat 3-vector as one joint", () => {
		const json = { ...toJson(swayingRecords(1)[0]), global_orient: [0.1, 0.2, 0.3] };

		expect(parsePoseRecord(json).globalOrient).toEqual([[0.1, 0.2, 0.3]]);
	});

	it("reports a missing field", () => {
		const { transl: _transl, ...json } = toJson(swayingRecords(1)[0]);
		const err = thrown(() => parsePoseRecord(json, 4, "0005.json"));

		expect(err).toBeInstanceOf(ShapeMismatchError);
		expect(err).toMatchObject({ recordIndex: 4, field: "transl" });
		expect(String(err)).toContain("record 4 (0005.json): transl");
	});

	it("rejects a flat array that is not a multiple of 3", () => {
		const json = { ...toJson(swayingRecords(1)[0]), body_pose: new Array<number>(62).fill(0) };

		expect(thrown(() => parsePoseRecord(json))).toMatchObject({ field: "body_pose" });
	});

	it("leaves joint counts to sequence validation", () => {
		const json = { ...toJson(swayingRecords(1)[0]), body_pose: flat(20, 0) };
		const record = parsePoseRecord(json);

		expect(record.bodyPose).toHaveLength(20);
		expect(() => createPoseSequence([record])).toThrow("record 0, body_pose: expected 21 joints, got 20");
	});
});

describe("decodeNpz", () => {
	it("flattens each array by name", () => {
		const arrays = decodeNpz(zipSync({ "transl.npy": npy([1, 3], [0.5, -1, 2]), "README.txt": new Uint8Array(1) }));

		expect(arrays).toEqual({ transl: [0.5, -1, 2] });
	});

	it("reorders Fortran-ordered matrices to row-major", () => {
		const arrays = decodeNpz(zipSync({ "body_pose.npy": npy([2, 3], [1, 4, 2, 5, 3, 6], true) }));

		expect(arrays.body_pose).toEqual([1, 2, 3, 4, 5, 6]);
	});

	it("decodes stored and deflated archives into records", () => {
		const [first, second] = swayingRecords(2);

		expect(parsePoseRecord(decodeNpz(toNpz(first, 0)))).toEqual(first);
		expect(parsePoseRecord(decodeNpz(toNpz(second, 6)))).toEqual(second);
	});
});

describe("loadPoseRecords", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "pose-records-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads *.json files in name order", async () => {
		const [first, second] = swayingRecords(2);
		await writeFile(join(dir, "0002.json"), JSON.stringify(toJson(second)));
		await writeFile(join(dir, "0001.json"), JSON.stringify(toJson(first)));
		await writeFile(join(dir, "notes.txt"), "not a record");

		const records = await loadPoseRecords(dir);

		expect(records).toEqual([first, second]);
	});

	it("loads .npz archives alongside JSON records", async () => {
		const [first, second, third] = swayingRecords(3);
		await writeFile(join(dir, "0001.npz"), toNpz(first));
		await writeFile(join(dir, "0002.json"), JSON.stringify(toJson(second)));
		await writeFile(join(dir, "0003.npz"), toNpz(third, 0));

		const records = await loadPoseRecords(dir);

		expect(records).toEqual([first, second, third]);
		expect(createPoseSequence(records).samples).toHaveLength(3);
	});

	it("names the file that is not a valid archive", async () => {
		await writeFile(join(dir, "0001.npz"), "not a zip archive");

		await expect(loadPoseRecords(dir)).rejects.toThrow("record 0 (0001.npz): invalid .npz archive");
	});

	it("names the file that is not valid JSON", async () => {
		await writeFile(join(dir, "0001.json"), JSON.stringify(toJson(swayingRecords(1)[0])));
		await writeFile(join(dir, "0002.json"), "{oops");

		await expect(loadPoseRecords(dir)).rejects.toThrow("record 1 (0002.json): invalid JSON");
	});
});
