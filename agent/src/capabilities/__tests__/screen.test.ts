import { describe, expect, it, vi } from "vitest";
import { type ScreenCaptureArgs, ScreenCapability, type ScreenInfo } from "../screen.js";

const IMAGE = { format: "png", width: 1920, height: 1080, base64: "iVBORw0KGgo=" };

function captureMock() {
	return vi.fn(async (_args: ScreenCaptureArgs) => IMAGE);
}

describe("ScreenCapability", () => {
	it("declares capture and list", () => {
		expect(new ScreenCapability().commands).toEqual(["screen.capture", "screen.list"]);
	});

	it("captures with defaults and returns a data URI", async () => {
		const capture = captureMock();
		const cap = new ScreenCapability({ provider: { capture } });
		const res = await cap.execute({ id: "c1", command: "screen.capture", args: {} });
		expect(capture).toHaveBeenCalledWith({
			format: "png",
			maxWidth: 1920,
			quality: 80,
			monitorIndex: 0,
			includePointer: true,
		});
		expect(res).toEqual({
			id: "c1",
			ok: true,
			payload: {
				format: "png",
				width: 1920,
				height: 1080,
				base64: "iVBORw0KGgo=",
				image: "data:image/png;base64,iVBORw0KGgo=",
			},
		});
	});

	it("reads the legacy monitor key when screenIndex is absent", async () => {
		const capture = captureMock();
		const cap = new ScreenCapability({ provider: { capture } });
		await cap.execute({ id: "c2", command: "screen.capture", args: { monitor: 2 } });
		expect(capture.mock.calls[0]?.[0].monitorIndex).toBe(2);
	});

	it("prefers screenIndex over monitor", async () => {
		const capture = captureMock();
		const cap = new ScreenCapability({ provider: { capture } });
		await cap.execute({
			id: "c3",
			command: "screen.capture",
			args: { monitor: 2, screenIndex: 1 },
		});
		expect(capture.mock.calls[0]?.[0].monitorIndex).toBe(1);
	});

	it("reports a missing capture provider", async () => {
		const res = await new ScreenCapability().execute({ id: "c4", command: "screen.capture" });
		expect(res).toEqual({ id: "c4", ok: false, error: "Screen capture not available" });
	});

	it("wraps capture failures", async () => {
		const cap = new ScreenCapability({
			provider: {
				capture: async () => {
					throw new Error("display asleep");
				},
			},
		});
		const res = await cap.execute({ id: "c5", command: "screen.capture" });
		expect(res).toEqual({ id: "c5", ok: false, error: "Capture failed: display asleep" });
	});

	it("serializes concurrent captures", async () => {
		let active = 0;
		let maxActive = 0;
		const capture = vi.fn(async () => {
			active++;
			maxActive = Math.max(maxActive, active);
			await new Promise((resolve) => setTimeout(resolve, 5));
			active--;
			return IMAGE;
		});
		const cap = new ScreenCapability({ provider: { capture } });
		const results = await Promise.all([
			cap.execute({ id: "q1", command: "screen.capture" }),
			cap.execute({ id: "q2", command: "screen.capture" }),
			cap.execute({ id: "q3", command: "screen.capture" }),
		]);
		expect(results.map((r) => r.id)).toEqual(["q1", "q2", "q3"]);
		expect(maxActive).toBe(1);
		expect(capture).toHaveBeenCalledTimes(3);
	});

	it("lists screens", async () => {
		const screens: ScreenInfo[] = [
			{
				index: 0,
				name: "DISPLAY1",
				primary: true,
				bounds: { x: 0, y: 0, width: 2560, height: 1440 },
				workingArea: { x: 0, y: 0, width: 2560, height: 1400 },
			},
		];
		const cap = new ScreenCapability({ provider: { list: async () => screens } });
		const res = await cap.execute({ id: "l1", command: "screen.list" });
		expect(res).toEqual({ id: "l1", ok: true, payload: { screens } });
	});

	it("reports list errors", async () => {
		expect(await new ScreenCapability().execute({ id: "l2", command: "screen.list" })).toEqual({
			id: "l2",
			ok: false,
			error: "Screen list not available",
		});
		const cap = new ScreenCapability({
			provider: {
				list: async () => {
					throw new Error("no session");
				},
			},
		});
		expect((await cap.execute({ id: "l3", command: "screen.list" })).error).toBe(
			"List failed: no session",
		);
	});
});
