import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type { CanvasSurface, CanvasWindowOptions } from "../canvas/surface.js";
import type {
	CameraInfo,
	CameraProvider,
	CameraSnapArgs,
	CameraSnapResult,
} from "../capabilities/camera.js";
import type {
	ScreenCaptureArgs,
	ScreenCaptureResult,
	ScreenInfo,
	ScreenProvider,
} from "../capabilities/screen.js";
import { CameraPermissionError } from "../errors.js";
import { HandlerSet } from "../handler-set.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import {
	CameraListSchema,
	EvalResultSchema,
	type HostCommand,
	HostInboundSchema,
	type HostOutbound,
	ImageResultSchema,
	PERMISSION_DENIED_CODE,
	type ProviderMethod,
	type ProviderResponse,
	ScreenListSchema,
	StringResultSchema,
} from "./protocol.js";

export const PROVIDER_TIMEOUT_MS = 30_000;

interface PendingCall {
	resolve: (response: ProviderResponse) => void;
	reject: (error: Error) => void;
	timer: ReturnType<typeof setTimeout>;
}

export interface HostBridgeOptions {
	/** Receives one serialized message per call, without the newline */
	write: (line: string) => void;
	logger?: NodeLogger;
	timeoutMs?: number;
}

/**
 * Node side of the UI host protocol. The screen, camera and canvas
 * providers forward each call to the host as a provider_request line and
 * resolve with the matching provider_response.
 */
export class HostBridge {
	readonly screen: ScreenProvider;
	readonly camera: CameraProvider;
	readonly canvas: CanvasSurface;
	private readonly write: (line: string) => void;
	private readonly logger: NodeLogger;
	private readonly timeoutMs: number;
	private readonly pending = new Map<string, PendingCall>();
	private readonly commandHandlers: HandlerSet<HostCommand>;
	private url: string | null = null;

	constructor(options: HostBridgeOptions) {
		this.write = options.write;
		this.logger = options.logger ?? nullLogger;
		this.timeoutMs = options.timeoutMs ?? PROVIDER_TIMEOUT_MS;
		this.commandHandlers = new HandlerSet("host command", this.logger);
		this.screen = {
			capture: (args: ScreenCaptureArgs): Promise<ScreenCaptureResult> =>
				this.call("screen.capture", args, ImageResultSchema),
			list: (): Promise<ScreenInfo[]> => this.call("screen.list", {}, ScreenListSchema),
		};
		this.camera = {
			list: (): Promise<CameraInfo[]> => this.call("camera.list", {}, CameraListSchema),
			snap: (args: CameraSnapArgs): Promise<CameraSnapResult> =>
				this.call("camera.snap", args, ImageResultSchema),
		};
		this.canvas = {
			show: async (options: CanvasWindowOptions) => {
				await this.callRaw("canvas.show", options);
			},
			hide: async () => {
				await this.callRaw("canvas.hide", {});
			},
			navigate: async (url: string) => {
				await this.callRaw("canvas.navigate", { url });
				this.url = url;
			},
			loadHtml: async (html: string) => {
				await this.callRaw("canvas.loadHtml", { html });
				this.url = null;
			},
			eval: (script: string) => this.call("canvas.eval", { script }, EvalResultSchema),
			snapshot: (format: string) => this.call("canvas.snapshot", { format }, StringResultSchema),
			currentUrl: () => this.url,
		};
	}

	get pendingCount(): number {
		return this.pending.size;
	}

	send(message: HostOutbound): void {
		this.write(JSON.stringify(message));
	}

	onCommand(handler: (command: HostCommand) => void): () => void {
		return this.commandHandlers.add(handler);
	}

	/** Feed one line read from the host */
	handleLine(line: string): void {
		const text = line.trim();
		if (!text) return;
		let data: unknown;
		try {
			data = JSON.parse(text);
		} catch {
			this.send({ type: "error", message: "Invalid JSON line" });
			return;
		}
		const parsed = HostInboundSchema.safeParse(data);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			this.send({
				type: "error",
				message: `Invalid host message: ${issue ? `${issue.path.join(".") || "type"}: ${issue.message}` : "unknown"}`,
			});
			return;
		}
		const message = parsed.data;
		if (message.type === "provider_response") {
			this.resolveCall(message);
			return;
		}
		this.commandHandlers.emit(message);
	}

	/** Fail every outstanding call, e.g. when the host goes away */
	close(reason = "Host bridge closed"): void {
		for (const [id, call] of this.pending) {
			clearTimeout(call.timer);
			call.reject(new Error(reason));
			this.pending.delete(id);
		}
	}

	private async call<S extends z.ZodTypeAny>(
		method: ProviderMethod,
		args: unknown,
		schema: S,
	): Promise<z.output<S>> {
		const result = await this.callRaw(method, args);
		const parsed = schema.safeParse(result);
		if (!parsed.success) {
			throw new Error(`Host returned an invalid ${method} result`);
		}
		return parsed.data;
	}

	private async callRaw(method: ProviderMethod, args: unknown): Promise<unknown> {
		const response = await new Promise<ProviderResponse>((resolve, reject) => {
			const requestId = randomUUID();
			const timer = setTimeout(() => {
				this.pending.delete(requestId);
				reject(new Error(`${method} timed out after ${this.timeoutMs}ms`));
			}, this.timeoutMs);
			this.pending.set(requestId, { resolve, reject, timer });
			try {
				this.send({ type: "provider_request", requestId, method, args });
			} catch (err) {
				clearTimeout(timer);
				this.pending.delete(requestId);
				reject(err instanceof Error ? err : new Error(String(err)));
			}
		});
		if (response.ok) return response.result;
		const message = response.error ?? `${method} failed`;
		if (response.code === PERMISSION_DENIED_CODE) {
			throw new CameraPermissionError(message);
		}
		throw new Error(message);
	}

	private resolveCall(response: ProviderResponse): void {
		const call = this.pending.get(response.requestId);
		if (!call) {
			this.logger.warn("Provider response for unknown request", {
				requestId: response.requestId,
			});
			return;
		}
		clearTimeout(call.timer);
		this.pending.delete(response.requestId);
		call.resolve(response);
	}
}
