import { z } from "zod";

/** Gateway WebSocket protocol frame types */

export const PROTOCOL_VERSION = 3;

export type ConnectionStatus = "disconnected" | "connecting" | "connected" | "error";

const GatewayErrorSchema = z.object({
	code: z.string(),
	message: z.string(),
	details: z.unknown().optional(),
});

const RequestFrameSchema = z.object({
	type: z.literal("req"),
	id: z.string(),
	method: z.string(),
	params: z.unknown().optional(),
});

const ResponseOkSchema = z.object({
	type: z.literal("res"),
	id: z.string(),
	ok: z.literal(true),
	payload: z.unknown().optional(),
});

const ResponseErrorSchema = z.object({
	type: z.literal("res"),
	id: z.string(),
	ok: z.literal(false),
	error: GatewayErrorSchema.default({
		code: "UNKNOWN",
		message: "Gateway request failed",
	}),
});

const EventFrameSchema = z.object({
	type: z.enum(["event", "evt"]),
	event: z.string(),
	payload: z.unknown().optional(),
	seq: z.number().optional(),
});

export const GatewayFrameSchema = z.union([
	RequestFrameSchema,
	ResponseOkSchema,
	ResponseErrorSchema,
	EventFrameSchema,
]);

export type GatewayErrorShape = z.infer<typeof GatewayErrorSchema>;
export type GatewayRequest = z.infer<typeof RequestFrameSchema>;
export type GatewayResponseOk = z.infer<typeof ResponseOkSchema>;
export type GatewayResponseError = z.infer<typeof ResponseErrorSchema>;
export type GatewayResponse = GatewayResponseOk | GatewayResponseError;
export type GatewayEvent = z.infer<typeof EventFrameSchema>;
export type GatewayFrame = z.infer<typeof GatewayFrameSchema>;

/** Decode one text frame; null for anything that is not a protocol frame */
export function parseFrame(text: string): GatewayFrame | null {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch {
		return null;
	}
	const parsed = GatewayFrameSchema.safeParse(data);
	return parsed.success ? parsed.data : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string | undefined {
	const value = record[key];
	return typeof value === "string" ? value : undefined;
}

export function readNumber(record: Record<string, unknown>, key: string): number | undefined {
	const value = record[key];
	return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function readRecord(
	record: Record<string, unknown>,
	key: string,
): Record<string, unknown> | undefined {
	const value = record[key];
	return isRecord(value) ? value : undefined;
}

/** Payload of a successful `connect` response */
export interface HelloPayload {
	protocol?: number;
	methods: string[];
	raw: Record<string, unknown>;
}
