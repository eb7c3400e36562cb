import { describe, expect, it, vi } from "vitest";
import { CameraPermissionError } from "../../errors.js";
import {
	CAMERA_PERMISSION_MESSAGE,
	CameraCapability,
	type CameraSnapArgs,
	normalizeCameraFormat,
} from "../camera.js";

const FRAME = { format: "jpeg", width: 1280, height: 720, base64: "/9j/4AAQ" };

describe("CameraCapability", () => {
	it("declares list and snap", () => {
		expect(new CameraCapability().commands).toEqual(["camera.list", "camera.snap"]);
	});

	it("lists cameras", async () => {
		const cameras = [{ deviceId: "cam-1", name: "Integrated Camera", isDefault: true }];
		const cap = new CameraCapability({ provider: { list: async () => cameras } });
		expect(await cap.execute({ id: "l1", command: "camera.list" })).toEqual({
			id: "l1",
			ok: true,
			payload: { cameras },
		});
	});

	it("reports a missing list provider", async () => {
		expect(await new CameraCapability().execute({ id: "l2", command: "camera.list" })).toEqual({
			id: "l2",
			ok: false,
			error: "Camera list not available",
		});
	});

	it("snaps with defaults", async () => {
		const snap = vi.fn(async (_args: CameraSnapArgs) => FRAME);
		const cap = new CameraCapability({ provider: { snap } });
		const res = await cap.execute({ id: "s1", command: "camera.snap", args: {} });
		expect(snap).toHaveBeenCalledWith({
			deviceId: undefined,
			format: "jpeg",
			maxWidth: 1280,
			quality: 80,
		});
		expect(res).toEqual({ id: "s1", ok: true, payload: FRAME });
	});

	it("passes deviceId and normalized format", async () => {
		const snap = vi.fn(async (_args: CameraSnapArgs) => FRAME);
		const cap = new CameraCapability({ provider: { snap } });
		await cap.execute({
			id: "s2",
			command: "camera.snap",
			args: { deviceId: "cam-2", format: "PNG", maxWidth: 640, quality: 50 },
		});
		expect(snap).toHaveBeenCalledWith({ deviceId: "cam-2", format: "png", maxWidth: 640, quality: 50 });
	});

	it("normalizeCameraFormat maps everything but png to jpeg", () => {
		expect(normalizeCameraFormat("png")).toBe("png");
		expect(normalizeCameraFormat(" Png ")).toBe("png");
		expect(normalizeCameraFormat("jpg")).toBe("jpeg");
		expect(normalizeCameraFormat("webp")).toBe("jpeg");
		expect(normalizeCameraFormat(undefined)).toBe("jpeg");
	});

	it("gives permission denials their own message", async () => {
		const cap = new CameraCapability({
			provider: {
				snap: async () => {
					throw new CameraPermissionError();
				},
			},
		});
		expect(await cap.execute({ id: "p1", command: "camera.snap" })).toEqual({
			id: "p1",
			ok: false,
			error: CAMERA_PERMISSION_MESSAGE,
		});
	});

	it("treats EACCES as a permission denial", async () => {
		const cap = new CameraCapability({
			provider: {
				snap: async () => {
					throw Object.assign(new Error("open /dev/video0"), { code: "EACCES" });
				},
			},
		});
		expect((await cap.execute({ id: "p2", command: "camera.snap" })).error).toBe(
			CAMERA_PERMISSION_MESSAGE,
		);
	});

	it("wraps other list failures", async () => {
		const cap = new CameraCapability({
			provider: {
				list: async () => {
					throw new Error("enumeration failed");
				},
			},
		});
		expect((await cap.execute({ id: "l3", command: "camera.list" })).error).toBe(
			"List failed: enumeration failed",
		);
	});
});
