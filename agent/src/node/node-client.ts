import { CapabilityRegistry } from "../capabilities/registry.js";
import type {
	ArgBag,
	InvokeResponse,
	NodeCapability,
	NodeRegistration,
} from "../capabilities/types.js";
import { GatewayRequestError, IdentityNotInitializedError, errorMessage } from "../errors.js";
import {
	type CloseInfo,
	type ConnectChallenge,
	GatewayConnection,
	type GatewayConnectionOptions,
} from "../gateway/connection.js";
import {
	type ConnectionStatus,
	type GatewayEvent,
	type HelloPayload,
	PROTOCOL_VERSION,
	isRecord,
	readRecord,
	readString,
} from "../gateway/types.js";
import { HandlerSet } from "../handler-set.js";
import type { IdentityStore } from "../identity/device-identity.js";
import { type NodeLogger, nullLogger } from "../logger.js";

export type { ConnectionStatus };
export type PairingStatus = "unknown" | "pending" | "paired" | "rejected";

export interface StatusChange {
	status: ConnectionStatus;
	previous: ConnectionStatus;
	/** Caused by disconnect() rather than the gateway or the network */
	requested: boolean;
	error?: string;
}

export interface PairingChange {
	status: PairingStatus;
	deviceId: string;
	message?: string;
}

export interface NodeClientOptions {
	gatewayUrl: string;
	/** One-time auth token; also part of the signed payload */
	token: string;
	identity: IdentityStore;
	registry?: CapabilityRegistry;
	clientId?: string;
	displayName: string;
	platform: string;
	version: string;
	permissions?: Record<string, boolean>;
	logger?: NodeLogger;
	connection?: Omit<GatewayConnectionOptions, "logger">;
}

export const DEFAULT_CLIENT_ID = "node-host";

const NOT_PAIRED = "NOT_PAIRED";
const PAIRING_REJECTED = "PAIRING_REJECTED";

/**
 * The node role's connection to the gateway: handshake, pairing,
 * registration and invoke dispatch. Reconnection is left to the caller
 * (see createReconnector).
 */
export class NodeClient {
	readonly registry: CapabilityRegistry;
	private readonly identity: IdentityStore;
	private readonly logger: NodeLogger;
	private readonly clientId: string;
	private readonly displayName: string;
	private readonly platform: string;
	private readonly version: string;
	private readonly token: string;
	private readonly connectionOptions: Omit<GatewayConnectionOptions, "logger">;
	private readonly permissions: Record<string, boolean>;
	private readonly statusHandlers: HandlerSet<StatusChange>;
	private readonly pairingHandlers: HandlerSet<PairingChange>;
	private _gatewayUrl: string;
	private connection: GatewayConnection | null = null;
	private _status: ConnectionStatus = "disconnected";
	private _pairingStatus: PairingStatus = "unknown";
	private registered = false;

	constructor(options: NodeClientOptions) {
		this._gatewayUrl = options.gatewayUrl;
		this.token = options.token;
		this.identity = options.identity;
		this.logger = options.logger ?? nullLogger;
		this.registry = options.registry ?? new CapabilityRegistry();
		this.clientId = options.clientId ?? DEFAULT_CLIENT_ID;
		this.displayName = options.displayName;
		this.platform = options.platform;
		this.version = options.version;
		this.permissions = { ...options.permissions };
		this.connectionOptions = options.connection ?? {};
		this.statusHandlers = new HandlerSet("status", this.logger);
		this.pairingHandlers = new HandlerSet("pairing", this.logger);
	}

	get status(): ConnectionStatus {
		return this._status;
	}

	get pairingStatus(): PairingStatus {
		return this._pairingStatus;
	}

	get isConnected(): boolean {
		return this._status === "connected";
	}

	get isPaired(): boolean {
		return this._pairingStatus === "paired";
	}

	get isPendingApproval(): boolean {
		return this._pairingStatus === "pending";
	}

	get nodeId(): string | null {
		return this.identity.isInitialized ? this.identity.deviceId : null;
	}

	get shortDeviceId(): string | null {
		return this.identity.isInitialized ? this.identity.shortDeviceId : null;
	}

	get gatewayUrl(): string {
		return this._gatewayUrl;
	}

	set gatewayUrl(url: string) {
		this._gatewayUrl = url;
	}

	get registration(): NodeRegistration {
		return {
			capabilities: this.registry.categories,
			commands: this.registry.commands,
			permissions: { ...this.permissions },
			platform: this.platform,
			displayName: this.displayName,
			version: this.version,
		};
	}

	onStatusChange(handler: (change: StatusChange) => void): () => void {
		return this.statusHandlers.add(handler);
	}

	onPairingChange(handler: (change: PairingChange) => void): () => void {
		return this.pairingHandlers.add(handler);
	}

	registerCapability(capability: NodeCapability): void {
		this.registry.register(capability);
		this.reRegister();
	}

	setPermission(name: string, granted: boolean): void {
		this.permissions[name] = granted;
		this.reRegister();
	}

	/**
	 * Open the connection and run the handshake. Resolves with the resulting
	 * status; gateway and transport failures are reported through it rather
	 * than thrown.
	 */
	async connect(): Promise<ConnectionStatus> {
		if (!this.identity.isInitialized) throw new IdentityNotInitializedError();
		if (this._status === "connecting" || this._status === "connected") {
			return this._status;
		}

		const connection = new GatewayConnection({
			...this.connectionOptions,
			logger: this.logger,
		});
		this.connection = connection;
		this.registered = false;
		connection.onEvent((event) => this.handleEvent(connection, event));
		connection.onClose((info) => this.handleClose(connection, info));
		this.setStatus("connecting");
		this.logger.info(`Connecting to ${this._gatewayUrl}`);

		let hello: HelloPayload;
		try {
			hello = await connection.open(this._gatewayUrl, (challenge) =>
				this.buildConnectParams(challenge),
			);
		} catch (err) {
			if (this.connection !== connection) return this._status;
			this.connection = null;
			this.handleConnectFailure(err);
			return this._status;
		}
		if (this.connection !== connection) return this._status;

		this.setStatus("connected");
		this.logger.info("Connected to gateway", { methods: hello.methods.length });
		this.applyHello(hello);
		if (this.isPaired) {
			await this.register(connection);
		}
		return this._status;
	}

	disconnect(): void {
		const connection = this.connection;
		this.connection = null;
		this.registered = false;
		connection?.close();
		if (this._status !== "disconnected") {
			this.setStatus("disconnected", { requested: true });
		}
	}

	buildConnectParams(challenge: ConnectChallenge): Record<string, unknown> {
		const signedAt = Date.now();
		const signature = this.identity.signPayload(
			challenge.nonce,
			signedAt,
			this.clientId,
			this.token,
		);
		const deviceToken = this.identity.deviceToken;
		return {
			minProtocol: PROTOCOL_VERSION,
			maxProtocol: PROTOCOL_VERSION,
			client: {
				id: this.clientId,
				displayName: this.displayName,
				version: this.version,
				platform: this.platform,
				mode: "node",
			},
			role: "node",
			scopes: [],
			caps: this.registry.categories,
			commands: this.registry.commands,
			permissions: { ...this.permissions },
			auth: deviceToken ? { token: this.token, deviceToken } : { token: this.token },
			device: {
				id: this.identity.deviceId,
				publicKey: this.identity.publicKey,
				signature,
				signedAt,
				nonce: challenge.nonce,
			},
		};
	}

	private applyHello(hello: HelloPayload): void {
		const deviceToken = readString(readRecord(hello.raw, "auth") ?? {}, "deviceToken");
		if (deviceToken) {
			this.identity.storeDeviceToken(deviceToken);
			this.setPairing("paired");
			return;
		}
		const pairing = readRecord(hello.raw, "pairing");
		if (pairing && readString(pairing, "status") === "pending") {
			this.setPairing("pending", readString(pairing, "message"));
			return;
		}
		this.setPairing("paired");
	}

	private handleConnectFailure(err: unknown): void {
		const message = errorMessage(err);
		if (err instanceof GatewayRequestError && err.code === NOT_PAIRED) {
			this.logger.info("Device awaiting pairing approval");
			this.setPairing("pending", message);
			this.setStatus("disconnected", { error: message });
			return;
		}
		if (err instanceof GatewayRequestError && err.code === PAIRING_REJECTED) {
			this.logger.warn("Pairing rejected by gateway", { error: message });
			this.setPairing("rejected", message);
			this.setStatus("error", { error: message });
			return;
		}
		this.logger.error("Gateway connect failed", { error: message });
		this.setStatus("error", { error: message });
	}

	private handleClose(connection: GatewayConnection, info: CloseInfo): void {
		if (this.connection !== connection) return;
		this.connection = null;
		this.registered = false;
		if (info.error) {
			this.logger.error("Gateway connection lost", { error: info.error.message });
			this.setStatus("error", { requested: info.requested, error: info.error.message });
			return;
		}
		this.logger.warn(`Gateway connection closed (${info.code})`);
		this.setStatus("disconnected", { requested: info.requested });
	}

	private handleEvent(connection: GatewayConnection, event: GatewayEvent): void {
		switch (event.event) {
			case "node.invoke.request":
				this.handleInvoke(connection, event.payload).catch((err: unknown) => {
					this.logger.error("Invoke handling failed", { error: errorMessage(err) });
				});
				break;
			case "device.pair.resolved":
				this.handlePairResolved(connection, event.payload);
				break;
			default:
				break;
		}
	}

	private handlePairResolved(connection: GatewayConnection, payload: unknown): void {
		if (!isRecord(payload)) return;
		const deviceId = readString(payload, "deviceId");
		if (deviceId && deviceId !== this.nodeId) return;
		const decision = readString(payload, "decision") ?? readString(payload, "status");
		if (decision === "approved" || decision === "paired") {
			const token = readString(payload, "deviceToken");
			if (token) this.identity.storeDeviceToken(token);
			this.setPairing("paired");
			this.register(connection).catch((err: unknown) => {
				this.logger.error("Registration failed", { error: errorMessage(err) });
			});
		} else if (decision === "rejected") {
			this.setPairing("rejected", readString(payload, "reason"));
		}
	}

	private async handleInvoke(connection: GatewayConnection, payload: unknown): Promise<void> {
		if (!isRecord(payload)) {
			this.logger.warn("Dropping invoke request without payload");
			return;
		}
		const id = readString(payload, "id");
		if (!id) {
			this.logger.warn("Dropping invoke request without id");
			return;
		}
		const command = readString(payload, "command") ?? "";
		this.logger.debug(`Invoke ${command}`, { id });

		const decoded = decodeInvokeArgs(payload);
		const response: InvokeResponse = decoded.ok
			? await this.registry.dispatch({ id, command, args: decoded.args })
			: { id, ok: false, error: decoded.error };

		try {
			await connection.request("node.invoke.result", {
				...response,
				nodeId: this.nodeId,
			});
		} catch (err) {
			this.logger.error(`Failed to send result for ${command}`, {
				id,
				error: errorMessage(err),
			});
		}
	}

	private async register(connection: GatewayConnection): Promise<void> {
		if (this.connection !== connection) return;
		const registration = this.registration;
		try {
			await connection.request("node.register", registration);
			this.registered = true;
			this.logger.info("Registered capabilities", {
				capabilities: registration.capabilities,
				commands: registration.commands.length,
			});
		} catch (err) {
			this.logger.warn("Capability registration failed", { error: errorMessage(err) });
		}
	}

	private reRegister(): void {
		const connection = this.connection;
		if (!connection || !this.registered) return;
		this.register(connection).catch((err: unknown) => {
			this.logger.error("Re-registration failed", { error: errorMessage(err) });
		});
	}

	private setStatus(
		status: ConnectionStatus,
		extra: { requested?: boolean; error?: string } = {},
	): void {
		const previous = this._status;
		this._status = status;
		this.statusHandlers.emit({
			status,
			previous,
			requested: extra.requested ?? false,
			...(extra.error !== undefined ? { error: extra.error } : {}),
		});
	}

	private setPairing(status: PairingStatus, message?: string): void {
		if (this._pairingStatus === status && message === undefined) return;
		this._pairingStatus = status;
		this.pairingHandlers.emit({
			status,
			deviceId: this.identity.deviceId,
			...(message !== undefined ? { message } : {}),
		});
	}
}

type DecodedArgs = { ok: true; args: ArgBag } | { ok: false; error: string };

/** Invoke args arrive as `args`, `params` or a `paramsJSON` string */
export function decodeInvokeArgs(payload: Record<string, unknown>): DecodedArgs {
	const args = readRecord(payload, "args") ?? readRecord(payload, "params");
	if (args) return { ok: true, args };
	const json = payload.paramsJSON;
	if (typeof json !== "string" || json.trim() === "") return { ok: true, args: {} };
	let parsed: unknown;
	try {
		parsed = JSON.parse(json);
	} catch (err) {
		return { ok: false, error: `Invalid paramsJSON: ${errorMessage(err)}` };
	}
	if (parsed === null) return { ok: true, args: {} };
	if (!isRecord(parsed)) return { ok: false, error: "Invalid paramsJSON: expected an object" };
	return { ok: true, args: parsed };
}
