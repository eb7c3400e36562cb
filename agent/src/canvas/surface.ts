import {
	type CanvasA2UIArgs,
	type CanvasHandlers,
	type CanvasPresentArgs,
	resolveCanvasContent,
} from "../capabilities/canvas.js";
import { errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import {
	buildA2UIMessageScript,
	buildA2UIResetScript,
	isTrustedA2UIUrl,
	splitJsonlMessages,
} from "./a2ui.js";

export const CANVAS_CALL_TIMEOUT_MS = 10_000;
export const CANVAS_SNAPSHOT_TIMEOUT_MS = 5_000;

export interface CanvasWindowOptions {
	title: string;
	width: number;
	height: number;
	x: number;
	y: number;
	alwaysOnTop: boolean;
}

/** The rendering surface owned by the UI layer */
export interface CanvasSurface {
	show(options: CanvasWindowOptions): Promise<void>;
	hide(): Promise<void>;
	navigate(url: string): Promise<void>;
	loadHtml(html: string): Promise<void>;
	eval(script: string): Promise<string>;
	snapshot(format: string): Promise<string>;
	currentUrl(): string | null;
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(new Error(`${label} timed out after ${ms}ms`));
		}, ms);
		promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(err: unknown) => {
				clearTimeout(timer);
				reject(err);
			},
		);
	});
}

export interface CanvasSurfaceOptions {
	/** Resolved lazily; the gateway URL may change between connects */
	a2uiHostUrl: () => string | null;
	logger?: NodeLogger;
	callTimeoutMs?: number;
	snapshotTimeoutMs?: number;
}

/**
 * Binds canvas capability callbacks to a surface. Fire-and-forget
 * operations log their failures; eval and snapshot are awaited with a
 * timeout.
 */
export function createCanvasHandlers(
	surface: CanvasSurface,
	options: CanvasSurfaceOptions,
): CanvasHandlers {
	const logger = options.logger ?? nullLogger;
	const callTimeoutMs = options.callTimeoutMs ?? CANVAS_CALL_TIMEOUT_MS;
	const snapshotTimeoutMs = options.snapshotTimeoutMs ?? CANVAS_SNAPSHOT_TIMEOUT_MS;

	const background = (label: string, task: () => Promise<void>): void => {
		task().catch((err: unknown) => {
			logger.error(`Canvas ${label} failed`, { error: errorMessage(err) });
		});
	};

	const ensureA2UIHost = async (): Promise<void> => {
		const hostUrl = options.a2uiHostUrl();
		if (!hostUrl) throw new Error("A2UI host URL unavailable");
		if (!isTrustedA2UIUrl(hostUrl)) throw new Error("A2UI host URL is not allowed");
		if (surface.currentUrl() !== hostUrl) {
			await surface.navigate(hostUrl);
		}
	};

	return {
		present: (args: CanvasPresentArgs) =>
			background("present", async () => {
				await surface.show({
					title: args.title,
					width: args.width,
					height: args.height,
					x: args.x,
					y: args.y,
					alwaysOnTop: args.alwaysOnTop,
				});
				const content = resolveCanvasContent(args);
				if (content?.kind === "url") {
					await surface.navigate(content.url);
				} else if (content?.kind === "html") {
					await surface.loadHtml(content.html);
				}
				logger.info(`Canvas presented: ${args.width}x${args.height}`);
			}),
		hide: () => background("hide", () => surface.hide()),
		navigate: (url: string) => background("navigate", () => surface.navigate(url)),
		evaluate: (script: string) => withTimeout(surface.eval(script), callTimeoutMs, "Canvas eval"),
		snapshot: (args) =>
			withTimeout(surface.snapshot(args.format), snapshotTimeoutMs, "Canvas snapshot"),
		pushA2UI: (args: CanvasA2UIArgs) =>
			background("A2UI push", async () => {
				await ensureA2UIHost();
				let sent = 0;
				for (const line of splitJsonlMessages(args.jsonl)) {
					await withTimeout(
						surface.eval(buildA2UIMessageScript(line)),
						callTimeoutMs,
						"A2UI message",
					);
					sent++;
				}
				logger.info(`Canvas A2UI push: ${sent} message(s)`);
			}),
		resetA2UI: () =>
			background("A2UI reset", async () => {
				await ensureA2UIHost();
				await withTimeout(surface.eval(buildA2UIResetScript()), callTimeoutMs, "A2UI reset");
				logger.info("Canvas A2UI reset");
			}),
	};
}
