import { errorMessage } from "../errors.js";
import { HandlerSet } from "../handler-set.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import { GatewayConnection, type GatewayConnectionOptions } from "./connection.js";
import {
	type ChannelHealthEntry,
	type HealthResult,
	HealthSchema,
	getHealth,
	getUsageCost,
	getUsageStatus,
} from "./diagnostics-proxy.js";
import {
	type ActivityKind,
	type AgentActivity,
	type ChannelHealth,
	type GatewayUsage,
	type SessionInfo,
	activityGlyph,
	classifyNotification,
	classifyTool,
	formatAuthAge,
	shortenPath,
	truncateLabel,
} from "./models.js";
import type { GatewayRequester } from "./requester.js";
import { type RawSession, listSessions } from "./sessions-proxy.js";
import {
	type ConnectionStatus,
	PROTOCOL_VERSION,
	type GatewayEvent,
	isRecord,
	readRecord,
	readString,
} from "./types.js";

export interface GatewayNotification {
	title: string;
	type: ReturnType<typeof classifyNotification>["type"];
	text: string;
	sessionKey?: string;
}

export interface GatewayClientOptions {
	url: string;
	token: string;
	clientId?: string;
	platform?: string;
	version?: string;
	logger?: NodeLogger;
	connection?: Omit<GatewayConnectionOptions, "logger">;
}

const OPERATOR_SCOPES = ["operator.read"];
const NOTIFICATION_MAX_LENGTH = 200;

export function isMainSessionKey(key: string): boolean {
	return key === "main" || key.endsWith(":main");
}

function channelStatus(entry: ChannelHealthEntry): string {
	if (entry.status) return entry.status;
	if (entry.lastError) return "error";
	if (entry.running || entry.connected) return "running";
	if (entry.linked) return "linked";
	if (entry.configured) return "configured";
	return "not configured";
}

export function channelsFromHealth(health: HealthResult): ChannelHealth[] {
	return Object.entries(health.channels ?? {}).map(([name, entry]) => {
		const channel: ChannelHealth = { name, status: channelStatus(entry) };
		if (entry.linked) channel.isLinked = true;
		if (typeof entry.authAgeMs === "number") channel.authAge = formatAuthAge(entry.authAgeMs);
		if (entry.lastError) channel.error = entry.lastError;
		return channel;
	});
}

function toSessionInfo(raw: RawSession): SessionInfo {
	const session: SessionInfo = {
		key: raw.key,
		isMain: raw.kind === "main" || isMainSessionKey(raw.key),
		status: raw.status ?? "unknown",
	};
	if (raw.channel) session.channel = raw.channel;
	if (raw.model) session.model = raw.model;
	if (raw.displayName) session.displayName = raw.displayName;
	if (typeof raw.updatedAt === "number") session.updatedAt = raw.updatedAt;
	return session;
}

/** Short human label for a tool call's arguments */
export function toolLabel(kind: ActivityKind, name: string, args: Record<string, unknown>): string {
	const pick = (...keys: string[]) => {
		for (const key of keys) {
			const value = readString(args, key);
			if (value) return value;
		}
		return undefined;
	};
	let label: string | undefined;
	switch (kind) {
		case "exec":
			label = pick("command", "cmd");
			break;
		case "read":
		case "write":
		case "edit": {
			const path = pick("path", "file_path", "file");
			label = path ? shortenPath(path) : undefined;
			break;
		}
		case "search":
			label = pick("query", "url");
			break;
		case "browser":
			label = pick("url", "action");
			break;
		case "message":
			label = pick("to", "channel");
			break;
		default:
			break;
	}
	return truncateLabel(label ?? name);
}

function messageText(message: unknown): string {
	if (!isRecord(message)) return "";
	const content = message.content;
	if (typeof content === "string") return content;
	if (!Array.isArray(content)) return readString(message, "text") ?? "";
	return content
		.map((part) => (isRecord(part) && part.type === "text" ? (readString(part, "text") ?? "") : ""))
		.join("")
		.trim();
}

/**
 * Operator-side mirror of gateway state: channel health, sessions, usage
 * and live agent activity, refreshed on connect and kept current from
 * gateway events.
 */
export class GatewayClient implements GatewayRequester {
	private readonly options: GatewayClientOptions;
	private readonly logger: NodeLogger;
	private connection: GatewayConnection | null = null;
	private _status: ConnectionStatus = "disconnected";
	private _channels: ChannelHealth[] = [];
	private sessions = new Map<string, SessionInfo>();
	private _usage: GatewayUsage | null = null;
	private _activity: AgentActivity | null = null;
	private readonly statusHandlers: HandlerSet<ConnectionStatus>;
	private readonly channelsHandlers: HandlerSet<ChannelHealth[]>;
	private readonly sessionsHandlers: HandlerSet<SessionInfo[]>;
	private readonly usageHandlers: HandlerSet<GatewayUsage>;
	private readonly activityHandlers: HandlerSet<AgentActivity | null>;
	private readonly notificationHandlers: HandlerSet<GatewayNotification>;

	constructor(options: GatewayClientOptions) {
		this.options = options;
		this.logger = options.logger ?? nullLogger;
		this.statusHandlers = new HandlerSet("status", this.logger);
		this.channelsHandlers = new HandlerSet("channels", this.logger);
		this.sessionsHandlers = new HandlerSet("sessions", this.logger);
		this.usageHandlers = new HandlerSet("usage", this.logger);
		this.activityHandlers = new HandlerSet("activity", this.logger);
		this.notificationHandlers = new HandlerSet("notification", this.logger);
	}

	get status(): ConnectionStatus {
		return this._status;
	}

	get channels(): ChannelHealth[] {
		return [...this._channels];
	}

	get usage(): GatewayUsage | null {
		return this._usage;
	}

	get activity(): AgentActivity | null {
		return this._activity;
	}

	get availableMethods(): string[] {
		return this.connection?.availableMethods ?? [];
	}

	isConnected(): boolean {
		return this.connection?.isConnected() ?? false;
	}

	/** Main sessions first, then most recently updated */
	getSessionList(): SessionInfo[] {
		return [...this.sessions.values()].sort((a, b) => {
			if (a.isMain !== b.isMain) return a.isMain ? -1 : 1;
			return (b.updatedAt ?? 0) - (a.updatedAt ?? 0);
		});
	}

	onStatusChange(handler: (status: ConnectionStatus) => void): () => void {
		return this.statusHandlers.add(handler);
	}

	onChannelsChange(handler: (channels: ChannelHealth[]) => void): () => void {
		return this.channelsHandlers.add(handler);
	}

	onSessionsChange(handler: (sessions: SessionInfo[]) => void): () => void {
		return this.sessionsHandlers.add(handler);
	}

	onUsageChange(handler: (usage: GatewayUsage) => void): () => void {
		return this.usageHandlers.add(handler);
	}

	onActivityChange(handler: (activity: AgentActivity | null) => void): () => void {
		return this.activityHandlers.add(handler);
	}

	onNotification(handler: (notification: GatewayNotification) => void): () => void {
		return this.notificationHandlers.add(handler);
	}

	async connect(): Promise<void> {
		if (this.connection) return;
		const connection = new GatewayConnection({
			...this.options.connection,
			logger: this.logger,
		});
		this.connection = connection;
		connection.onEvent((event) => this.handleEvent(event));
		connection.onClose((info) => {
			if (this.connection !== connection) return;
			this.connection = null;
			this.setStatus(info.error ? "error" : "disconnected");
		});
		this.setStatus("connecting");

		try {
			await connection.open(this.options.url, () => ({
				minProtocol: PROTOCOL_VERSION,
				maxProtocol: PROTOCOL_VERSION,
				client: {
					id: this.options.clientId ?? "cli",
					platform: this.options.platform ?? process.platform,
					mode: "cli",
					version: this.options.version ?? "0.0.0",
				},
				role: "operator",
				scopes: OPERATOR_SCOPES,
				auth: { token: this.options.token },
			}));
		} catch (err) {
			if (this.connection === connection) this.connection = null;
			this.logger.error("Operator connect failed", { error: errorMessage(err) });
			this.setStatus("error");
			throw err;
		}
		this.setStatus("connected");
		await this.refresh();
	}

	disconnect(): void {
		const connection = this.connection;
		this.connection = null;
		connection?.close();
		this.setStatus("disconnected");
	}

	request(method: string, params: unknown): Promise<unknown> {
		if (!this.connection) {
			return Promise.reject(new Error("Not connected to gateway"));
		}
		return this.connection.request(method, params);
	}

	/** Pull health, sessions and usage; each failure is logged on its own */
	async refresh(): Promise<void> {
		await Promise.all([
			this.refreshHealth().catch((err: unknown) => this.logRefreshError("health", err)),
			this.refreshSessions().catch((err: unknown) => this.logRefreshError("sessions", err)),
			this.refreshUsage().catch((err: unknown) => this.logRefreshError("usage", err)),
		]);
	}

	async refreshHealth(): Promise<void> {
		this.applyHealth(await getHealth(this));
	}

	async refreshSessions(): Promise<void> {
		const result = await listSessions(this);
		const next = new Map<string, SessionInfo>();
		for (const raw of result.sessions) {
			const session = toSessionInfo(raw);
			const activity = this.sessions.get(raw.key)?.currentActivity;
			if (activity) session.currentActivity = activity;
			next.set(raw.key, session);
		}
		this.sessions = next;
		this.sessionsHandlers.emit(this.getSessionList());
	}

	async refreshUsage(): Promise<void> {
		const [status, cost] = await Promise.all([getUsageStatus(this), getUsageCost(this)]);
		const usage: GatewayUsage = {
			totalTokens: status.totalTokens,
			costUsd: cost.totalCost,
			requestCount: status.totalRequests,
		};
		if (status.model) usage.model = status.model;
		this._usage = usage;
		this.usageHandlers.emit(usage);
	}

	private logRefreshError(what: string, err: unknown): void {
		this.logger.warn(`Failed to refresh ${what}`, { error: errorMessage(err) });
	}

	private applyHealth(health: HealthResult): void {
		this._channels = channelsFromHealth(health);
		this.channelsHandlers.emit(this.channels);
	}

	private handleEvent(event: GatewayEvent): void {
		switch (event.event) {
			case "health": {
				const parsed = HealthSchema.safeParse(event.payload);
				if (parsed.success) this.applyHealth(parsed.data);
				break;
			}
			case "agent":
				this.handleAgentEvent(event.payload);
				break;
			case "chat":
				this.handleChatEvent(event.payload);
				break;
			default:
				break;
		}
	}

	private handleAgentEvent(payload: unknown): void {
		if (!isRecord(payload)) return;
		const sessionKey = readString(payload, "sessionKey") ?? "main";
		const stream = readString(payload, "stream");
		const data = readRecord(payload, "data") ?? {};
		const phase = readString(data, "phase");

		if (stream === "tool" && phase === "start") {
			const name = readString(data, "name") ?? "tool";
			const kind = classifyTool(name);
			this.setActivity({
				sessionKey,
				isMain: isMainSessionKey(sessionKey),
				kind,
				label: toolLabel(kind, name, readRecord(data, "args") ?? {}),
			});
			return;
		}
		if ((stream === "tool" && phase === "result") || (stream === "lifecycle" && phase === "end")) {
			if (this._activity?.sessionKey === sessionKey) {
				this.setActivity(null, sessionKey);
			}
		}
	}

	private handleChatEvent(payload: unknown): void {
		if (!isRecord(payload)) return;
		if (readString(payload, "state") !== "final") return;
		const message = payload.message;
		if (isRecord(message) && readString(message, "role") === "user") return;
		const text = messageText(message);
		if (!text) return;
		const { title, type } = classifyNotification(text);
		const notification: GatewayNotification = {
			title,
			type,
			text: truncateLabel(text, NOTIFICATION_MAX_LENGTH),
		};
		const sessionKey = readString(payload, "sessionKey");
		if (sessionKey) notification.sessionKey = sessionKey;
		this.notificationHandlers.emit(notification);
	}

	private setActivity(activity: AgentActivity | null, clearedKey?: string): void {
		this._activity = activity;
		const key = activity?.sessionKey ?? clearedKey;
		if (key) {
			const session = this.sessions.get(key) ?? {
				key,
				isMain: isMainSessionKey(key),
				status: "active",
			};
			const updated: SessionInfo = { ...session, updatedAt: Date.now() };
			if (activity) {
				updated.currentActivity = `${activityGlyph(activity.kind)} ${activity.label}`;
			} else {
				delete updated.currentActivity;
			}
			this.sessions.set(key, updated);
			this.sessionsHandlers.emit(this.getSessionList());
		}
		this.activityHandlers.emit(activity);
	}

	private setStatus(status: ConnectionStatus): void {
		if (this._status === status) return;
		this._status = status;
		this.statusHandlers.emit(status);
	}
}
