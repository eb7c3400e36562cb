import { errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import { getBoolArg, getIntArg, getStringArg } from "./args.js";
import { type CommandHandler, NodeCapabilityBase, failure, success } from "./base.js";
import { SerialQueue } from "./serial-queue.js";
import type { ArgBag } from "./types.js";

export interface ScreenCaptureArgs {
	format: string;
	maxWidth: number;
	quality: number;
	monitorIndex: number;
	includePointer: boolean;
}

export interface ScreenCaptureResult {
	format: string;
	width: number;
	height: number;
	base64: string;
}

export interface Rect {
	x: number;
	y: number;
	width: number;
	height: number;
}

export interface ScreenInfo {
	index: number;
	name: string;
	primary: boolean;
	bounds: Rect;
	/** Desktop area excluding the taskbar */
	workingArea: Rect;
}

export interface ScreenProvider {
	capture(args: ScreenCaptureArgs): Promise<ScreenCaptureResult>;
	list(): Promise<ScreenInfo[]>;
}

export class ScreenCapability extends NodeCapabilityBase {
	readonly category = "screen";
	private provider: Partial<ScreenProvider>;
	private readonly queue = new SerialQueue();

	constructor(options: { provider?: Partial<ScreenProvider>; logger?: NodeLogger } = {}) {
		super(options.logger ?? nullLogger);
		this.provider = { ...options.provider };
	}

	bind(provider: Partial<ScreenProvider>): void {
		this.provider = { ...this.provider, ...provider };
	}

	unbind(): void {
		this.provider = {};
	}

	protected handlers(): Record<string, CommandHandler> {
		return {
			"screen.capture": (args) => this.capture(args),
			"screen.list": () => this.list(),
		};
	}

	private async capture(args: ArgBag) {
		const monitor = getIntArg(args, "monitor", 0);
		const captureArgs: ScreenCaptureArgs = {
			format: getStringArg(args, "format", "png"),
			maxWidth: getIntArg(args, "maxWidth", 1920),
			quality: getIntArg(args, "quality", 80),
			monitorIndex: getIntArg(args, "screenIndex", monitor),
			includePointer: getBoolArg(args, "includePointer", true),
		};
		this.logger.info(
			`screen.capture: format=${captureArgs.format}, maxWidth=${captureArgs.maxWidth}, monitor=${captureArgs.monitorIndex}`,
		);

		const capture = this.provider.capture;
		if (!capture) return failure("Screen capture not available");

		try {
			const result = await this.queue.run(() => capture(captureArgs));
			return success({
				format: result.format,
				width: result.width,
				height: result.height,
				base64: result.base64,
				image: `data:image/${result.format.toLowerCase()};base64,${result.base64}`,
			});
		} catch (err) {
			this.logger.error("Screen capture failed", { error: errorMessage(err) });
			return failure(`Capture failed: ${errorMessage(err)}`);
		}
	}

	private async list() {
		this.logger.info("screen.list");
		const list = this.provider.list;
		if (!list) return failure("Screen list not available");

		try {
			const screens = await this.queue.run(() => list());
			return success({
				screens: screens.map((s) => ({
					index: s.index,
					name: s.name,
					primary: s.primary,
					bounds: { ...s.bounds },
					workingArea: { ...s.workingArea },
				})),
			});
		} catch (err) {
			this.logger.error("Screen list failed", { error: errorMessage(err) });
			return failure(`List failed: ${errorMessage(err)}`);
		}
	}
}
