import { z } from "zod";
import type { ConnectionStatus } from "../gateway/types.js";
import type { PairingStatus } from "../node/node-client.js";

/**
 * JSON-lines protocol between the node process and the desktop UI host.
 * stdout carries node → host messages, stdin host → node.
 */

export const HostInboundSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("connect"),
		gatewayUrl: z.string().optional(),
	}),
	z.object({ type: z.literal("disconnect") }),
	z.object({
		type: z.literal("provider_response"),
		requestId: z.string().min(1),
		ok: z.boolean(),
		result: z.unknown().optional(),
		error: z.string().optional(),
		code: z.string().optional(),
	}),
]);

export type HostInbound = z.output<typeof HostInboundSchema>;
export type ProviderResponse = Extract<HostInbound, { type: "provider_response" }>;
export type HostCommand = Exclude<HostInbound, ProviderResponse>;

export type ProviderMethod =
	| "screen.capture"
	| "screen.list"
	| "camera.list"
	| "camera.snap"
	| "canvas.show"
	| "canvas.hide"
	| "canvas.navigate"
	| "canvas.loadHtml"
	| "canvas.eval"
	| "canvas.snapshot";

export type HostOutbound =
	| { type: "ready"; deviceId: string; version: string }
	| { type: "status"; status: ConnectionStatus; error?: string }
	| { type: "pairing"; status: PairingStatus; deviceId: string; message?: string }
	| { type: "notify"; title: string; body: string; subtitle?: string; sound: boolean }
	| { type: "provider_request"; requestId: string; method: ProviderMethod; args: unknown }
	| { type: "error"; message: string };

/** provider_response code for an OS permission denial */
export const PERMISSION_DENIED_CODE = "permission_denied";

const RectSchema = z.object({
	x: z.number(),
	y: z.number(),
	width: z.number(),
	height: z.number(),
});

export const ImageResultSchema = z.object({
	format: z.string(),
	width: z.number(),
	height: z.number(),
	base64: z.string(),
});

export const ScreenListSchema = z.array(
	z.object({
		index: z.number().int(),
		name: z.string(),
		primary: z.boolean(),
		bounds: RectSchema,
		workingArea: RectSchema,
	}),
);

export const CameraListSchema = z.array(
	z.object({
		deviceId: z.string(),
		name: z.string(),
		isDefault: z.boolean(),
	}),
);

export const StringResultSchema = z.string();

/** Script results come back as whatever the page returned */
export const EvalResultSchema = z
	.unknown()
	.transform((value) => (typeof value === "string" ? value : (JSON.stringify(value) ?? "")));
