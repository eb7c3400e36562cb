import { errorMessage, isPermissionDenied } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import { getIntArg, getStringArg } from "./args.js";
import { type CommandHandler, NodeCapabilityBase, failure, success } from "./base.js";
import { SerialQueue } from "./serial-queue.js";
import type { ArgBag } from "./types.js";

export type CameraFormat = "jpeg" | "png";

export interface CameraInfo {
	deviceId: string;
	name: string;
	isDefault: boolean;
}

export interface CameraSnapArgs {
	/** Omitted: the system default device */
	deviceId?: string;
	format: CameraFormat;
	maxWidth: number;
	quality: number;
}

export interface CameraSnapResult {
	format: string;
	width: number;
	height: number;
	base64: string;
}

export interface CameraProvider {
	list(): Promise<CameraInfo[]>;
	snap(args: CameraSnapArgs): Promise<CameraSnapResult>;
}

export const CAMERA_PERMISSION_MESSAGE =
	"Camera access blocked. Enable camera access for desktop apps in your system privacy settings.";

/** "png" stays png; "jpg", "jpeg" and anything else become jpeg */
export function normalizeCameraFormat(format: string | undefined): CameraFormat {
	return format?.trim().toLowerCase() === "png" ? "png" : "jpeg";
}

export class CameraCapability extends NodeCapabilityBase {
	readonly category = "camera";
	private provider: Partial<CameraProvider>;
	private readonly queue = new SerialQueue();

	constructor(options: { provider?: Partial<CameraProvider>; logger?: NodeLogger } = {}) {
		super(options.logger ?? nullLogger);
		this.provider = { ...options.provider };
	}

	bind(provider: Partial<CameraProvider>): void {
		this.provider = { ...this.provider, ...provider };
	}

	unbind(): void {
		this.provider = {};
	}

	protected handlers(): Record<string, CommandHandler> {
		return {
			"camera.list": () => this.list(),
			"camera.snap": (args) => this.snap(args),
		};
	}

	private async list() {
		this.logger.info("camera.list");
		const list = this.provider.list;
		if (!list) return failure("Camera list not available");

		try {
			const cameras = await this.queue.run(() => list());
			return success({ cameras });
		} catch (err) {
			this.logger.error("Camera list failed", { error: errorMessage(err) });
			return failure(`List failed: ${errorMessage(err)}`);
		}
	}

	private async snap(args: ArgBag) {
		const snapArgs: CameraSnapArgs = {
			deviceId: getStringArg(args, "deviceId"),
			format: normalizeCameraFormat(getStringArg(args, "format", "jpeg")),
			maxWidth: getIntArg(args, "maxWidth", 1280),
			quality: getIntArg(args, "quality", 80),
		};
		this.logger.info(
			`camera.snap: deviceId=${snapArgs.deviceId ?? "(default)"}, format=${snapArgs.format}`,
		);

		const snap = this.provider.snap;
		if (!snap) return failure("Camera snap not available");

		try {
			const result = await this.queue.run(() => snap(snapArgs));
			return success({
				format: result.format,
				width: result.width,
				height: result.height,
				base64: result.base64,
			});
		} catch (err) {
			if (isPermissionDenied(err)) {
				this.logger.warn("Camera access denied by the OS", { error: errorMessage(err) });
				return failure(CAMERA_PERMISSION_MESSAGE);
			}
			this.logger.error("Camera snap failed", { error: errorMessage(err) });
			return failure(`Snap failed: ${errorMessage(err)}`);
		}
	}
}
