import { readFile } from "node:fs/promises";
import { errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import { getBoolArg, getIntArg, getObjectArg, getStringArg } from "./args.js";
import { type CommandHandler, NodeCapabilityBase, failure, success } from "./base.js";
import type { ArgBag } from "./types.js";

export interface CanvasPresentArgs {
	url?: string;
	html?: string;
	width: number;
	height: number;
	/** -1 centers the window on that axis */
	x: number;
	y: number;
	title: string;
	alwaysOnTop: boolean;
}

export interface CanvasSnapshotArgs {
	format: string;
	maxWidth: number;
	quality: number;
}

export interface CanvasA2UIArgs {
	jsonl: string;
	jsonlPath?: string;
	props: Record<string, unknown>;
}

/** Callbacks supplied by the UI layer; any of them may be missing */
export interface CanvasHandlers {
	present?: (args: CanvasPresentArgs) => void;
	hide?: () => void;
	navigate?: (url: string) => void;
	evaluate?: (script: string) => Promise<string>;
	snapshot?: (args: CanvasSnapshotArgs) => Promise<string>;
	pushA2UI?: (args: CanvasA2UIArgs) => void;
	resetA2UI?: () => void;
}

/** What the surface should load for a present request; url wins over html */
export function resolveCanvasContent(
	args: Pick<CanvasPresentArgs, "url" | "html">,
): { kind: "url"; url: string } | { kind: "html"; html: string } | null {
	if (args.url) return { kind: "url", url: args.url };
	if (args.html) return { kind: "html", html: args.html };
	return null;
}

const SCRIPT_KEYS = ["script", "javaScript", "javascript"] as const;

export class CanvasCapability extends NodeCapabilityBase {
	readonly category = "canvas";
	private bound: CanvasHandlers;

	constructor(options: { handlers?: CanvasHandlers; logger?: NodeLogger } = {}) {
		super(options.logger ?? nullLogger);
		this.bound = { ...options.handlers };
	}

	/** Merge in handlers, e.g. once the canvas window exists */
	bind(handlers: CanvasHandlers): void {
		this.bound = { ...this.bound, ...handlers };
	}

	unbind(): void {
		this.bound = {};
	}

	protected handlers(): Record<string, CommandHandler> {
		return {
			"canvas.present": (args) => this.present(args),
			"canvas.hide": () => this.hide(),
			"canvas.navigate": (args) => this.navigate(args),
			"canvas.eval": (args) => this.evaluate(args),
			"canvas.snapshot": (args) => this.snapshot(args),
			"canvas.a2ui.push": (args) => this.pushA2UI(args),
			"canvas.a2ui.reset": () => this.resetA2UI(),
		};
	}

	private present(args: ArgBag) {
		const present: CanvasPresentArgs = {
			url: getStringArg(args, "url"),
			html: getStringArg(args, "html"),
			width: getIntArg(args, "width", 800),
			height: getIntArg(args, "height", 600),
			x: getIntArg(args, "x", -1),
			y: getIntArg(args, "y", -1),
			title: getStringArg(args, "title", "Canvas"),
			alwaysOnTop: getBoolArg(args, "alwaysOnTop", false),
		};
		this.logger.info(
			`canvas.present: url=${present.url ?? "(html)"}, size=${present.width}x${present.height}`,
		);
		this.bound.present?.(present);
		return success({ presented: true });
	}

	private hide() {
		this.logger.info("canvas.hide");
		this.bound.hide?.();
		return success({ hidden: true });
	}

	private navigate(args: ArgBag) {
		const url = getStringArg(args, "url");
		if (!url) return failure("Missing url parameter");

		this.logger.info(`canvas.navigate: ${url}`);
		this.bound.navigate?.(url);
		return success({ navigated: true });
	}

	private async evaluate(args: ArgBag) {
		let script: string | undefined;
		for (const key of SCRIPT_KEYS) {
			script = getStringArg(args, key);
			if (script !== undefined) break;
		}
		if (!script) return failure("Missing script parameter");

		this.logger.info(`canvas.eval: ${script.slice(0, 50)}...`);
		const evaluate = this.bound.evaluate;
		if (!evaluate) return failure("Canvas not available");

		try {
			const result = await evaluate(script);
			return success({ result });
		} catch (err) {
			return failure(`Eval failed: ${errorMessage(err)}`);
		}
	}

	private async snapshot(args: ArgBag) {
		const snapshotArgs: CanvasSnapshotArgs = {
			format: getStringArg(args, "format", "png"),
			maxWidth: getIntArg(args, "maxWidth", 1200),
			quality: getIntArg(args, "quality", 80),
		};
		this.logger.info(
			`canvas.snapshot: format=${snapshotArgs.format}, maxWidth=${snapshotArgs.maxWidth}`,
		);
		const snapshot = this.bound.snapshot;
		if (!snapshot) return failure("Canvas not available");

		try {
			const base64 = await snapshot(snapshotArgs);
			return success({ format: snapshotArgs.format, base64 });
		} catch (err) {
			return failure(`Snapshot failed: ${errorMessage(err)}`);
		}
	}

	private async pushA2UI(args: ArgBag) {
		let jsonl = getStringArg(args, "jsonl");
		const jsonlPath = getStringArg(args, "jsonlPath");

		if (!jsonl?.trim() && jsonlPath?.trim()) {
			try {
				jsonl = await readFile(jsonlPath, "utf-8");
			} catch (err) {
				this.logger.error(`canvas.a2ui.push: failed to read jsonlPath (${jsonlPath})`, {
					error: errorMessage(err),
				});
				return failure(`Failed to read jsonlPath: ${errorMessage(err)}`);
			}
		}
		if (!jsonl?.trim()) return failure("Missing jsonl or jsonlPath parameter");

		const pushA2UI = this.bound.pushA2UI;
		if (!pushA2UI) return failure("Canvas not available");

		this.logger.info(`canvas.a2ui.push: ${jsonl.length} chars`);
		pushA2UI({ jsonl, jsonlPath, props: getObjectArg(args, "props") });
		return success({ pushed: true });
	}

	private resetA2UI() {
		this.logger.info("canvas.a2ui.reset");
		const resetA2UI = this.bound.resetA2UI;
		if (!resetA2UI) return failure("Canvas not available");

		resetA2UI();
		return success({ reset: true });
	}
}
