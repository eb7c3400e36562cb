import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { GatewayRequestError, errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import {
	type GatewayEvent,
	type GatewayRequest,
	type GatewayResponse,
	type HelloPayload,
	isRecord,
	parseFrame,
	readNumber,
	readRecord,
} from "./types.js";

type EventHandler = (event: GatewayEvent) => void;

export interface CloseInfo {
	/** close() was called locally */
	requested: boolean;
	code: number;
	/** Transport error seen before the socket closed */
	error: Error | null;
}

type CloseHandler = (info: CloseInfo) => void;

export interface ConnectChallenge {
	nonce: string;
	/** false when the gateway sent no challenge and the nonce is local */
	fromGateway: boolean;
}

/** Builds the `connect` request params for the nonce in play */
export type ConnectParamsBuilder = (challenge: ConnectChallenge) => Record<string, unknown>;

interface PendingRequest {
	resolve: (value: unknown) => void;
	reject: (error: Error) => void;
	timer: ReturnType<typeof setTimeout>;
}

export interface GatewayConnectionOptions {
	logger?: NodeLogger;
	requestTimeoutMs?: number;
	handshakeTimeoutMs?: number;
	/** How long to wait for connect.challenge before signing a local nonce */
	challengeGraceMs?: number;
}

const REQUEST_TIMEOUT_MS = 30_000;
const HANDSHAKE_TIMEOUT_MS = 10_000;
const CHALLENGE_GRACE_MS = 1_000;

function toHello(payload: unknown): HelloPayload {
	const raw = isRecord(payload) ? payload : {};
	const methods = readRecord(raw, "features")?.methods;
	return {
		protocol: readNumber(raw, "protocol"),
		methods: Array.isArray(methods)
			? methods.filter((m): m is string => typeof m === "string")
			: [],
		raw,
	};
}

/**
 * One WebSocket connection to the gateway, speaking protocol v3.
 *
 * Flow:
 * 1. Open WebSocket
 * 2. Receive connect.challenge event (nonce), or time out to a local nonce
 * 3. Send the connect request built by the caller for that nonce
 * 4. Receive hello-ok response (methods + features)
 *
 * Shared by the node role and the operator status mirror; each owns its
 * own instance.
 */
export class GatewayConnection {
	private ws: WebSocket | null = null;
	/** Socket still in its handshake */
	private opening: WebSocket | null = null;
	private pending = new Map<string, PendingRequest>();
	private eventHandlers: EventHandler[] = [];
	private closeHandlers: CloseHandler[] = [];
	private _availableMethods: string[] = [];
	private closeRequested = false;
	private readonly logger: NodeLogger;
	private readonly requestTimeoutMs: number;
	private readonly handshakeTimeoutMs: number;
	private readonly challengeGraceMs: number;

	constructor(options: GatewayConnectionOptions = {}) {
		this.logger = options.logger ?? nullLogger;
		this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
		this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? HANDSHAKE_TIMEOUT_MS;
		this.challengeGraceMs = options.challengeGraceMs ?? CHALLENGE_GRACE_MS;
	}

	get availableMethods(): string[] {
		return this._availableMethods;
	}

	isConnected(): boolean {
		return this.ws?.readyState === WebSocket.OPEN;
	}

	open(url: string, buildConnect: ConnectParamsBuilder): Promise<HelloPayload> {
		this.closeRequested = false;

		return new Promise((resolve, reject) => {
			const ws = new WebSocket(url);
			this.opening = ws;
			let settled = false;
			let handshakeDone = false;
			let connectId: string | null = null;
			let transportError: Error | null = null;
			let graceTimer: ReturnType<typeof setTimeout> | null = null;

			const handshakeTimer = setTimeout(() => {
				settle(new Error("Handshake timed out"));
			}, this.handshakeTimeoutMs);

			const settle = (err: Error | null, hello?: HelloPayload) => {
				if (settled) return;
				settled = true;
				if (this.opening === ws) this.opening = null;
				clearTimeout(handshakeTimer);
				if (graceTimer) clearTimeout(graceTimer);
				if (err) {
					ws.close();
					reject(err);
				} else if (hello) {
					resolve(hello);
				}
			};

			const sendConnect = (challenge: ConnectChallenge) => {
				if (connectId || settled) return;
				if (graceTimer) clearTimeout(graceTimer);
				let params: Record<string, unknown>;
				try {
					params = buildConnect(challenge);
				} catch (err) {
					settle(err instanceof Error ? err : new Error(String(err)));
					return;
				}
				connectId = randomUUID();
				const req: GatewayRequest = {
					type: "req",
					id: connectId,
					method: "connect",
					params,
				};
				ws.send(JSON.stringify(req));
			};

			ws.on("open", () => {
				graceTimer = setTimeout(() => {
					this.logger.debug("No connect.challenge received, using local nonce");
					sendConnect({ nonce: randomUUID(), fromGateway: false });
				}, this.challengeGraceMs);
			});

			ws.on("error", (err) => {
				transportError = err;
				settle(err);
			});

			ws.on("close", (code) => {
				if (!settled) {
					settle(transportError ?? new Error("Connection closed during handshake"));
				}
				if (this.ws === ws) this.ws = null;
				this.rejectPending(new Error("Connection closed"));
				if (!handshakeDone) return;
				const info: CloseInfo = {
					requested: this.closeRequested,
					code,
					error: transportError,
				};
				for (const handler of this.closeHandlers) {
					this.safely(() => handler(info));
				}
			});

			ws.on("message", (raw) => {
				const frame = parseFrame(raw.toString());
				if (!frame) {
					this.logger.debug("Ignoring unparseable frame");
					return;
				}

				// --- Handshake phase ---
				if (!handshakeDone) {
					if (frame.type === "event" || frame.type === "evt") {
						if (frame.event !== "connect.challenge") return;
						const nonce = isRecord(frame.payload) ? frame.payload.nonce : undefined;
						if (typeof nonce === "string" && nonce) {
							sendConnect({ nonce, fromGateway: true });
						}
						return;
					}
					if (frame.type === "res" && frame.id === connectId) {
						if (frame.ok) {
							const hello = toHello(frame.payload);
							this._availableMethods = hello.methods;
							handshakeDone = true;
							this.ws = ws;
							settle(null, hello);
						} else {
							settle(
								new GatewayRequestError(
									frame.error.code,
									frame.error.message || "Gateway handshake failed",
									frame.error.details,
								),
							);
						}
					}
					return;
				}

				// --- Normal operation phase ---
				if (frame.type === "res") {
					this.handleResponse(frame);
				} else if (frame.type === "event" || frame.type === "evt") {
					this.handleEvent(frame);
				}
			});
		});
	}

	request(method: string, params: unknown): Promise<unknown> {
		const ws = this.ws;
		if (!ws || ws.readyState !== WebSocket.OPEN) {
			return Promise.reject(new Error("Not connected to gateway"));
		}

		const id = randomUUID();
		const req: GatewayRequest = { type: "req", id, method, params };

		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				this.pending.delete(id);
				reject(new Error(`Request ${method} timed out`));
			}, this.requestTimeoutMs);

			this.pending.set(id, { resolve, reject, timer });
			ws.send(JSON.stringify(req));
		});
	}

	onEvent(handler: EventHandler): void {
		this.eventHandlers.push(handler);
	}

	onClose(handler: CloseHandler): void {
		this.closeHandlers.push(handler);
	}

	close(): void {
		this.closeRequested = true;
		if (this.opening) {
			this.opening.close();
			this.opening = null;
		}
		if (this.ws) {
			this.ws.close();
			this.ws = null;
		}
	}

	private rejectPending(error: Error): void {
		for (const [id, req] of this.pending) {
			clearTimeout(req.timer);
			req.reject(error);
			this.pending.delete(id);
		}
	}

	private handleResponse(res: GatewayResponse): void {
		const pending = this.pending.get(res.id);
		if (!pending) return;

		clearTimeout(pending.timer);
		this.pending.delete(res.id);

		if (res.ok) {
			pending.resolve(res.payload);
		} else {
			pending.reject(
				new GatewayRequestError(res.error.code, res.error.message, res.error.details),
			);
		}
	}

	private handleEvent(evt: GatewayEvent): void {
		for (const handler of this.eventHandlers) {
			this.safely(() => handler(evt));
		}
	}

	private safely(fn: () => void): void {
		try {
			fn();
		} catch (err) {
			this.logger.error("Gateway handler threw", { error: errorMessage(err) });
		}
	}
}
