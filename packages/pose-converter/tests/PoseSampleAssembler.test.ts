import { describe, it, expect } from "vitest";
import {
	NumericError,
	ShapeMismatchError,
	assemblePoseSample,
	createPoseSequence,
	rotationVectorToQuat,
	validatePoseRecord
} from "../src/index.js";
import { makeRecord, swayingRecords, thrown, zeros } from "./fixtures.js";

describe("assemblePoseSample", () => {
	it("produces 22 body and 15 + 15 hand rotations", () => {
		const sample = assemblePoseSample(makeRecord({ transl: [0.5, -0.25, 1] }));

		expect(sample.body).toHaveLength(22);
		expect(sample.leftHand).toHaveLength(15);
		expect(sample.rightHand).toHaveLength(15);
		expect(sample.translation).toEqual([0.5, -0.25, 1]);
	});

	it("puts the global orientation first, followed by the body pose", () => {
		const record = makeRecord({ globalOrient: [[0.4, 0, 0]] });
		record.bodyPose[0] = [0, 0.2, 0];
		const sample = assemblePoseSample(record);

		expect(sample.body[0]).toEqual(rotationVectorToQuat([0.4, 0, 0]));
		expect(sample.body[1]).toEqual(rotationVectorToQuat([0, 0.2, 0]));
	});

	it("mirrors the z component of both hands but not the body", () => {
		const record = makeRecord();
		record.bodyPose[0] = [0, 0, 0.5];
		record.leftHandPose[0] = [0, 0, 0.5];
		record.rightHandPose[3] = [0, 0, 0.5];
		const sample = assemblePoseSample(record);

		expect(sample.body[1][2]).toBeCloseTo(Math.sin(0.25), 12);
		expect(sample.leftHand[0][2]).toBeCloseTo(Math.sin(-0.25), 12);
		expect(sample.leftHand[0][3]).toBeCloseTo(Math.cos(0.25), 12);
		expect(sample.rightHand[3][2]).toBeCloseTo(Math.sin(-0.25), 12);
	});

	it("leaves x and y hand components unchanged", () => {
		const record = makeRecord();
		record.rightHandPose[0] = [0.3, 0, 0];
		record.leftHandPose[14] = [0, -0.6, 0];
		const sample = assemblePoseSample(record);

		expect(sample.rightHand[0][0]).toBeCloseTo(Math.sin(0.15), 12);
		expect(sample.leftHand[14][1]).toBeCloseTo(Math.sin(-0.3), 12);
	});

	it("returns a frozen sample", () => {
		const sample = assemblePoseSample(makeRecord());

		expect(Object.isFrozen(sample)).toBe(true);
		expect(Object.isFrozen(sample.body)).toBe(true);
		expect(Object.isFrozen(sample.translation)).toBe(true);
	});
});

describe("validatePoseRecord", () => {
	it("rejects a body pose with 20 joints", () => {
		const err = thrown(() => validatePoseRecord(makeRecord({ bodyPose: zeros(20) }), 0));

		expect(err).toBeInstanceOf(ShapeMismatchError);
		expect(err).toMatchObject({
			message: "record 0, body_pose: expected 21 joints, got 20",
			recordIndex: 0,
			field: "body_pose"
		});
	});

	it("rejects a hand with the wrong joint count", () => {
		expect(() => validatePoseRecord(makeRecord({ rightHandPose: zeros(16) }), 3)).toThrow(
			"record 3, right_hand_pose: expected 15 joints, got 16"
		);
	});

	it("reports non-finite values with their joint", () => {
		const record = makeRecord();
		record.bodyPose[4] = [0, Number.NaN, 0];
		const err = thrown(() => validatePoseRecord(record, 2));

		expect(err).toBeInstanceOf(NumericError);
		expect(err).toMatchObject({
			message: "record 2, body_pose[4]: non-finite component NaN at position 1",
			recordIndex: 2,
			field: "body_pose",
			joint: 4,
			name: "NumericError"
		});
	});

	it("reports a vector whose length overflows with its joint", () => {
		const records = swayingRecords(2);
		records[1].bodyPose[7] = [1.5e308, 1.5e308, 0];
		const err = thrown(() => createPoseSequence(records));

		expect(err).toBeInstanceOf(NumericError);
		expect(err).toMatchObject({
			message: "record 1, body_pose[7]: vector length overflows",
			recordIndex: 1,
			field: "body_pose",
			joint: 7
		});
	});

	it("rejects a non-finite translation", () => {
		const err = thrown(() => validatePoseRecord(makeRecord({ transl: [0, 0, Number.POSITIVE_INFINITY] }), 1));

		expect(err).toBeInstanceOf(NumericError);
		expect(err).toMatchObject({ field: "transl", recordIndex: 1 });
	});
});

describe("createPoseSequence", () => {
	it("assembles every record in order", () => {
		const records = swayingRecords(5);
		const sequence = createPoseSequence(records);

		expect(sequence.samples).toHaveLength(5);
		expect(sequence.samples[3].translation).toEqual(records[3].transl);
	});

	it("rejects the whole sequence when one record is malformed", () => {
		const records = [...swayingRecords(3), makeRecord({ bodyPose: zeros(20) })];
		const err = thrown(() => createPoseSequence(records));

		expect(err).toBeInstanceOf(ShapeMismatchError);
		expect(err).toMatchObject({ recordIndex: 3, field: "body_pose" });
	});

	it("rejects an empty sequence", () => {
		expect(() => createPoseSequence([])).toThrow(ShapeMismatchError);
	});
});
