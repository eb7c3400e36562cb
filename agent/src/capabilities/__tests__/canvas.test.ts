import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
	type CanvasA2UIArgs,
	CanvasCapability,
	type CanvasHandlers,
	type CanvasPresentArgs,
	resolveCanvasContent,
} from "../canvas.js";

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

function canvasWith(handlers: CanvasHandlers = {}) {
	return new CanvasCapability({ handlers });
}

describe("CanvasCapability", () => {
	it("declares the seven canvas commands", () => {
		expect(canvasWith().commands).toEqual([
			"canvas.present",
			"canvas.hide",
			"canvas.navigate",
			"canvas.eval",
			"canvas.snapshot",
			"canvas.a2ui.push",
			"canvas.a2ui.reset",
		]);
	});

	describe("canvas.present", () => {
		it("uses documented defaults", async () => {
			const present = vi.fn<(args: CanvasPresentArgs) => void>();
			const res = await canvasWith({ present }).execute({
				id: "p1",
				command: "canvas.present",
				args: {},
			});
			expect(res).toEqual({ id: "p1", ok: true, payload: { presented: true } });
			expect(present).toHaveBeenCalledWith({
				url: undefined,
				html: undefined,
				width: 800,
				height: 600,
				x: -1,
				y: -1,
				title: "Canvas",
				alwaysOnTop: false,
			});
		});

		it("replaces wrong-typed args with defaults", async () => {
			const present = vi.fn<(args: CanvasPresentArgs) => void>();
			await canvasWith({ present }).execute({
				id: "p2",
				command: "canvas.present",
				args: { width: "wide", height: 480, alwaysOnTop: "yes", title: "Board" },
			});
			expect(present.mock.calls[0]?.[0]).toMatchObject({
				width: 800,
				height: 480,
				alwaysOnTop: false,
				title: "Board",
			});
		});

		it("succeeds without a handler", async () => {
			const res = await canvasWith().execute({ id: "p3", command: "canvas.present" });
			expect(res.ok).toBe(true);
		});
	});

	it("resolveCanvasContent prefers url over html", () => {
		expect(resolveCanvasContent({ url: "https://a.test", html: "<p>x</p>" })).toEqual({
			kind: "url",
			url: "https://a.test",
		});
		expect(resolveCanvasContent({ html: "<p>x</p>" })).toEqual({ kind: "html", html: "<p>x</p>" });
		expect(resolveCanvasContent({})).toBeNull();
	});

	it("canvas.hide reports hidden", async () => {
		const hide = vi.fn();
		const res = await canvasWith({ hide }).execute({ id: "h1", command: "canvas.hide" });
		expect(res).toEqual({ id: "h1", ok: true, payload: { hidden: true } });
		expect(hide).toHaveBeenCalledTimes(1);
	});

	describe("canvas.navigate", () => {
		it("requires a url", async () => {
			const res = await canvasWith().execute({ id: "v1", command: "canvas.navigate", args: {} });
			expect(res).toEqual({ id: "v1", ok: false, error: "Missing url parameter" });
		});

		it("forwards the url", async () => {
			const navigate = vi.fn<(url: string) => void>();
			const res = await canvasWith({ navigate }).execute({
				id: "v2",
				command: "canvas.navigate",
				args: { url: "https://example.test/page" },
			});
			expect(res).toEqual({ id: "v2", ok: true, payload: { navigated: true } });
			expect(navigate).toHaveBeenCalledWith("https://example.test/page");
		});
	});

	describe("canvas.eval", () => {
		it("accepts script, javaScript and javascript keys", async () => {
			const evaluate = vi.fn(async (script: string) => `ran ${script}`);
			const cap = canvasWith({ evaluate });
			for (const key of ["script", "javaScript", "javascript"]) {
				const res = await cap.execute({ id: key, command: "canvas.eval", args: { [key]: "1+1" } });
				expect(res).toEqual({ id: key, ok: true, payload: { result: "ran 1+1" } });
			}
		});

		it("requires a script", async () => {
			const res = await canvasWith().execute({ id: "e1", command: "canvas.eval", args: {} });
			expect(res).toEqual({ id: "e1", ok: false, error: "Missing script parameter" });
		});

		it("reports an unbound canvas", async () => {
			const res = await canvasWith().execute({
				id: "e2",
				command: "canvas.eval",
				args: { script: "document.title" },
			});
			expect(res).toEqual({ id: "e2", ok: false, error: "Canvas not available" });
		});

		it("wraps evaluation failures", async () => {
			const res = await canvasWith({
				evaluate: async () => {
					throw new Error("ReferenceError: x is not defined");
				},
			}).execute({ id: "e3", command: "canvas.eval", args: { script: "x" } });
			expect(res).toEqual({
				id: "e3",
				ok: false,
				error: "Eval failed: ReferenceError: x is not defined",
			});
		});
	});

	describe("canvas.snapshot", () => {
		it("uses defaults and returns the image", async () => {
			const snapshot = vi.fn(async () => "aGVsbG8=");
			const res = await canvasWith({ snapshot }).execute({
				id: "s1",
				command: "canvas.snapshot",
				args: {},
			});
			expect(snapshot).toHaveBeenCalledWith({ format: "png", maxWidth: 1200, quality: 80 });
			expect(res).toEqual({ id: "s1", ok: true, payload: { format: "png", base64: "aGVsbG8=" } });
		});

		it("reports an unbound canvas", async () => {
			const res = await canvasWith().execute({ id: "s2", command: "canvas.snapshot" });
			expect(res).toEqual({ id: "s2", ok: false, error: "Canvas not available" });
		});

		it("wraps capture failures", async () => {
			const res = await canvasWith({
				snapshot: async () => {
					throw new Error("timed out");
				},
			}).execute({ id: "s3", command: "canvas.snapshot" });
			expect(res).toEqual({ id: "s3", ok: false, error: "Snapshot failed: timed out" });
		});
	});

	describe("canvas.a2ui.push", () => {
		it("passes inline jsonl through unmodified", async () => {
			const pushA2UI = vi.fn<(args: CanvasA2UIArgs) => void>();
			const jsonl = '{"type":"text"}\n{"type":"button"}';
			const res = await canvasWith({ pushA2UI }).execute({
				id: "a1",
				command: "canvas.a2ui.push",
				args: { jsonl, props: { theme: "dark" } },
			});
			expect(res).toEqual({ id: "a1", ok: true, payload: { pushed: true } });
			expect(pushA2UI).toHaveBeenCalledWith({
				jsonl,
				jsonlPath: undefined,
				props: { theme: "dark" },
			});
		});

		it("reads jsonl from jsonlPath when no inline jsonl is given", async () => {
			const dir = mkdtempSync(join(tmpdir(), "desknode-a2ui-"));
			tempDirs.push(dir);
			const file = join(dir, "ui.jsonl");
			writeFileSync(file, '{"type":"card"}\n');
			const pushA2UI = vi.fn<(args: CanvasA2UIArgs) => void>();
			await canvasWith({ pushA2UI }).execute({
				id: "a2",
				command: "canvas.a2ui.push",
				args: { jsonlPath: file },
			});
			expect(pushA2UI).toHaveBeenCalledWith({
				jsonl: '{"type":"card"}\n',
				jsonlPath: file,
				props: {},
			});
		});

		it("reports an unreadable jsonlPath", async () => {
			const res = await canvasWith({ pushA2UI: vi.fn() }).execute({
				id: "a3",
				command: "canvas.a2ui.push",
				args: { jsonlPath: join(tmpdir(), "desknode-missing", "nothing.jsonl") },
			});
			expect(res.ok).toBe(false);
			expect(res.error).toMatch(/^Failed to read jsonlPath: /);
		});

		it("requires jsonl or jsonlPath", async () => {
			const res = await canvasWith({ pushA2UI: vi.fn() }).execute({
				id: "a4",
				command: "canvas.a2ui.push",
				args: { jsonl: "   " },
			});
			expect(res).toEqual({ id: "a4", ok: false, error: "Missing jsonl or jsonlPath parameter" });
		});

		it("reports an unbound canvas", async () => {
			const res = await canvasWith().execute({
				id: "a5",
				command: "canvas.a2ui.push",
				args: { jsonl: "{}" },
			});
			expect(res).toEqual({ id: "a5", ok: false, error: "Canvas not available" });
		});
	});

	describe("canvas.a2ui.reset", () => {
		it("resets through the handler", async () => {
			const resetA2UI = vi.fn();
			const res = await canvasWith({ resetA2UI }).execute({ id: "r1", command: "canvas.a2ui.reset" });
			expect(res).toEqual({ id: "r1", ok: true, payload: { reset: true } });
			expect(resetA2UI).toHaveBeenCalledTimes(1);
		});

		it("reports an unbound canvas", async () => {
			const res = await canvasWith().execute({ id: "r2", command: "canvas.a2ui.reset" });
			expect(res).toEqual({ id: "r2", ok: false, error: "Canvas not available" });
		});
	});

	it("bind merges and unbind clears handlers", async () => {
		const cap = canvasWith();
		cap.bind({ evaluate: async () => "bound" });
		expect(
			await cap.execute({ id: "b1", command: "canvas.eval", args: { script: "1" } }),
		).toEqual({ id: "b1", ok: true, payload: { result: "bound" } });
		cap.unbind();
		expect(
			(await cap.execute({ id: "b2", command: "canvas.eval", args: { script: "1" } })).error,
		).toBe("Canvas not available");
	});
});
