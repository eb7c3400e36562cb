import { z } from "zod";
import { type GatewayRequester, requestParsed } from "./requester.js";

const ChannelEntrySchema = z
	.object({
		status: z.string().optional(),
		configured: z.boolean().optional(),
		linked: z.boolean().optional(),
		running: z.boolean().optional(),
		connected: z.boolean().optional(),
		authAgeMs: z.number().nullable().optional(),
		lastError: z.string().nullable().optional(),
	})
	.passthrough();

export const HealthSchema = z
	.object({
		status: z.string().optional(),
		ok: z.boolean().optional(),
		uptime: z.number().optional(),
		version: z.string().optional(),
		channels: z.record(ChannelEntrySchema).optional(),
	})
	.passthrough();

/** Health check result */
export type HealthResult = z.output<typeof HealthSchema>;
export type ChannelHealthEntry = z.output<typeof ChannelEntrySchema>;

export const UsageStatusSchema = z
	.object({
		totalRequests: z.number().default(0),
		totalTokens: z.number().default(0),
		activeProviders: z.array(z.string()).optional(),
		model: z.string().optional(),
	})
	.passthrough();

/** Usage status result */
export type UsageStatusResult = z.output<typeof UsageStatusSchema>;

export const UsageCostSchema = z
	.object({
		totalCost: z.number().default(0),
		breakdown: z.array(z.object({ provider: z.string(), cost: z.number() })).default([]),
	})
	.passthrough();

/** Usage cost result */
export type UsageCostResult = z.output<typeof UsageCostSchema>;

const GatewayStatusSchema = z
	.object({
		status: z.string(),
		gateway: z.string().optional(),
		connectedClients: z.number().optional(),
	})
	.passthrough();

/** Gateway status result */
export type GatewayStatusResult = z.output<typeof GatewayStatusSchema>;

const LogsTailSchema = z.object({
	file: z.string(),
	cursor: z.number(),
	size: z.number(),
	lines: z.array(z.string()),
});

/** Result from logs.tail RPC (cursor-based polling) */
export type LogsTailResult = z.output<typeof LogsTailSchema>;

/** Get Gateway health status */
export function getHealth(client: GatewayRequester): Promise<HealthResult> {
	return requestParsed(client, "health", {}, HealthSchema);
}

/** Get usage statistics */
export function getUsageStatus(client: GatewayRequester): Promise<UsageStatusResult> {
	return requestParsed(client, "usage.status", {}, UsageStatusSchema);
}

/** Get usage cost breakdown */
export function getUsageCost(client: GatewayRequester): Promise<UsageCostResult> {
	return requestParsed(client, "usage.cost", {}, UsageCostSchema);
}

/** Get overall Gateway status */
export function getGatewayStatus(client: GatewayRequester): Promise<GatewayStatusResult> {
	return requestParsed(client, "status", {}, GatewayStatusSchema);
}

/**
 * Poll Gateway logs. First call with no cursor returns recent lines + cursor.
 * Subsequent calls with cursor return only new lines since that cursor.
 */
export function pollLogsTail(client: GatewayRequester, cursor?: number): Promise<LogsTailResult> {
	const params = cursor != null ? { cursor } : {};
	return requestParsed(client, "logs.tail", params, LogsTailSchema);
}
