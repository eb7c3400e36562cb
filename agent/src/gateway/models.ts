import { PRODUCT_NAME } from "../capabilities/system.js";

export type ActivityKind =
	| "idle"
	| "job"
	| "exec"
	| "read"
	| "write"
	| "edit"
	| "search"
	| "browser"
	| "message"
	| "tool";

export interface AgentActivity {
	sessionKey: string;
	isMain: boolean;
	kind: ActivityKind;
	label: string;
}

export interface ChannelHealth {
	name: string;
	status: string;
	isLinked?: boolean;
	authAge?: string;
	error?: string;
}

export interface SessionInfo {
	key: string;
	isMain: boolean;
	status: string;
	channel?: string;
	model?: string;
	displayName?: string;
	currentActivity?: string;
	/** Epoch ms of the last update seen */
	updatedAt?: number;
}

export interface GatewayUsage {
	totalTokens: number;
	costUsd: number;
	requestCount: number;
	model?: string;
}

export type NotificationType =
	| "health"
	| "urgent"
	| "reminder"
	| "stock"
	| "email"
	| "calendar"
	| "error"
	| "build"
	| "info";

export interface NotificationInfo {
	title: string;
	type: NotificationType;
}

const NOTIFICATION_RULES: ReadonlyArray<{
	type: NotificationType;
	title: string;
	keywords: readonly string[];
}> = [
	{ type: "health", title: "🩸 Blood Sugar Alert", keywords: ["blood sugar", "glucose", "cgm", "mg/dl"] },
	{ type: "urgent", title: "🚨 Urgent Alert", keywords: ["urgent", "critical", "emergency"] },
	{ type: "reminder", title: "⏰ Reminder", keywords: ["reminder"] },
	{ type: "stock", title: "📦 Stock Alert", keywords: ["in stock", "available now"] },
	{ type: "email", title: "📧 Email", keywords: ["email", "inbox", "gmail"] },
	{ type: "calendar", title: "📅 Calendar", keywords: ["meeting", "calendar", "event"] },
	{ type: "error", title: "⚠️ Error", keywords: ["error", "failed", "exception"] },
	{ type: "build", title: "🔨 Build", keywords: ["build", "pipeline", "ci", "deploy"] },
];

export function classifyNotification(text: string): NotificationInfo {
	const lower = text.toLowerCase();
	for (const rule of NOTIFICATION_RULES) {
		if (rule.keywords.some((k) => lower.includes(k))) {
			return { title: rule.title, type: rule.type };
		}
	}
	return { title: PRODUCT_NAME, type: "info" };
}

export function classifyTool(name: string): ActivityKind {
	switch (name.toLowerCase()) {
		case "exec":
			return "exec";
		case "read":
			return "read";
		case "write":
			return "write";
		case "edit":
			return "edit";
		case "web_search":
		case "web_fetch":
			return "search";
		case "browser":
			return "browser";
		case "message":
			return "message";
		default:
			return "tool";
	}
}

/** Last two path segments behind an ellipsis */
export function shortenPath(path: string): string {
	if (!path) return "";
	const parts = path.split(/[/\\]/).filter((p) => p.length > 0);
	if (parts.length <= 1) return parts[0] ?? path;
	if (parts.length === 2) return parts[1] ?? path;
	return `…/${parts.slice(-2).join("/")}`;
}

export function truncateLabel(text: string, max = 60): string {
	if (!text || text.length <= max) return text;
	return `${text.slice(0, max - 1)}…`;
}

const ACTIVITY_GLYPHS: Record<ActivityKind, string> = {
	exec: "💻",
	read: "📄",
	write: "✍️",
	edit: "📝",
	search: "🔍",
	browser: "🌐",
	message: "💬",
	tool: "🛠️",
	job: "⚡",
	idle: "",
};

export function activityGlyph(kind: ActivityKind): string {
	return ACTIVITY_GLYPHS[kind];
}

export function activityDisplayText(activity: Pick<AgentActivity, "kind" | "isMain" | "label">): string {
	if (activity.kind === "idle") return "";
	const prefix = activity.isMain ? "Main" : "Sub";
	return `${prefix} · ${activityGlyph(activity.kind)} ${activity.label}`;
}

function channelTag(status: string): string {
	switch (status.toLowerCase()) {
		case "ok":
		case "connected":
		case "running":
			return "[ON]";
		case "linked":
			return "[LINKED]";
		case "ready":
			return "[READY]";
		case "connecting":
		case "reconnecting":
			return "[...]";
		case "error":
		case "disconnected":
			return "[ERR]";
		case "configured":
		case "stopped":
			return "[OFF]";
		case "not configured":
			return "[N/A]";
		default:
			return "[OFF]";
	}
}

function capitalize(text: string): string {
	return text ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}

export function channelDisplayText(channel: ChannelHealth): string {
	let text = `${channelTag(channel.status)} ${capitalize(channel.name)}: ${channel.status}`;
	if (channel.isLinked && channel.authAge) {
		text += ` (linked · ${channel.authAge})`;
	}
	if (channel.error) {
		text += ` (${channel.error})`;
	}
	return text;
}

export function sessionDisplayText(
	session: Pick<SessionInfo, "isMain" | "channel" | "currentActivity" | "status">,
): string {
	const parts = [session.isMain ? "Main" : "Sub"];
	if (session.channel) parts.push(session.channel);
	if (session.currentActivity) {
		parts.push(session.currentActivity);
	} else if (session.status && session.status !== "unknown" && session.status !== "active") {
		parts.push(session.status);
	}
	return parts.join(" · ");
}

export function sessionShortKey(key: string): string {
	if (!key) return "unknown";
	if (key.includes("/") || key.includes("\\")) {
		const segments = key.split(/[/\\]/);
		return segments[segments.length - 1] || key;
	}
	const colonParts = key.split(":");
	if (colonParts.length >= 2) {
		return colonParts[colonParts.length - 2] || key;
	}
	return key.length > 20 ? `${key.slice(0, 17)}...` : key;
}

export function formatTokenCount(tokens: number): string {
	if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(1)}M`;
	if (tokens >= 1_000) return `${(tokens / 1_000).toFixed(1)}K`;
	return String(tokens);
}

export function usageDisplayText(usage: Partial<GatewayUsage>): string {
	const parts: string[] = [];
	if (usage.totalTokens) parts.push(`Tokens: ${formatTokenCount(usage.totalTokens)}`);
	if (usage.costUsd) parts.push(`$${usage.costUsd.toFixed(2)}`);
	if (usage.requestCount) parts.push(`${usage.requestCount} requests`);
	if (usage.model) parts.push(usage.model);
	return parts.length > 0 ? parts.join(" · ") : "No usage data";
}

export function formatAuthAge(ms: number): string {
	const minutes = Math.floor(ms / 60_000);
	if (minutes < 1) return "just now";
	if (minutes < 60) return `${minutes}m ago`;
	const hours = Math.floor(minutes / 60);
	if (hours < 24) return `${hours}h ago`;
	return `${Math.floor(hours / 24)}d ago`;
}
