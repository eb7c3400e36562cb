import { describe, expect, it, vi } from "vitest";
import { CameraCapability } from "../camera.js";
import { type CanvasA2UIArgs, CanvasCapability } from "../canvas.js";
import { CapabilityRegistry } from "../registry.js";
import { type ScreenCaptureArgs, ScreenCapability } from "../screen.js";
import { SystemCapability } from "../system.js";

function fullRegistry(options: {
	camera?: CameraCapability;
	canvas?: CanvasCapability;
	screen?: ScreenCapability;
} = {}) {
	const registry = new CapabilityRegistry();
	registry.register(new SystemCapability());
	registry.register(options.canvas ?? new CanvasCapability());
	registry.register(options.screen ?? new ScreenCapability());
	registry.register(options.camera ?? new CameraCapability());
	return registry;
}

describe("invoke scenarios through the registry", () => {
	it("registers all four categories and their commands", () => {
		const registry = fullRegistry();
		expect(registry.categories).toEqual(["system", "canvas", "screen", "camera"]);
		expect(registry.commands).toHaveLength(12);
	});

	it("camera.snap without a bound handler is not available", async () => {
		const res = await fullRegistry().dispatch({ id: "1", command: "camera.snap", args: {} });
		expect(res).toEqual({ id: "1", ok: false, error: "Camera snap not available" });
	});

	it("canvas.navigate without url names the missing url", async () => {
		const res = await fullRegistry().dispatch({ id: "2", command: "canvas.navigate", args: {} });
		expect(res.ok).toBe(false);
		expect(res.error?.toLowerCase()).toContain("url");
	});

	it("screen.capture forwards screenIndex, format, maxWidth and quality", async () => {
		const capture = vi.fn(async (_args: ScreenCaptureArgs) => ({
			format: "jpeg",
			width: 800,
			height: 450,
			base64: "abc",
		}));
		const registry = fullRegistry({ screen: new ScreenCapability({ provider: { capture } }) });
		const res = await registry.dispatch({
			id: "3",
			command: "screen.capture",
			args: { format: "jpeg", maxWidth: 800, quality: 50, screenIndex: 1 },
		});
		expect(res.ok).toBe(true);
		expect(capture).toHaveBeenCalledWith({
			format: "jpeg",
			maxWidth: 800,
			quality: 50,
			monitorIndex: 1,
			includePointer: true,
		});
	});

	it("camera.snap failure carries the downstream message", async () => {
		const camera = new CameraCapability({
			provider: {
				snap: async () => {
					throw new Error("Camera access blocked");
				},
			},
		});
		const res = await fullRegistry({ camera }).dispatch({ id: "4", command: "camera.snap" });
		expect(res).toEqual({ id: "4", ok: false, error: "Snap failed: Camera access blocked" });
	});

	it("canvas.a2ui.push hands the jsonl over unmodified", async () => {
		const pushA2UI = vi.fn<(args: CanvasA2UIArgs) => void>();
		const canvas = new CanvasCapability({ handlers: { pushA2UI } });
		const res = await fullRegistry({ canvas }).dispatch({
			id: "5",
			command: "canvas.a2ui.push",
			args: { jsonl: '{"type":"text"}' },
		});
		expect(res).toEqual({ id: "5", ok: true, payload: { pushed: true } });
		expect(pushA2UI.mock.calls[0]?.[0].jsonl).toBe('{"type":"text"}');
	});
});
