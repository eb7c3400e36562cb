import { z } from "zod";
import { type GatewayRequester, requestParsed } from "./requester.js";

export const RawSessionSchema = z
	.object({
		key: z.string(),
		kind: z.string().optional(),
		displayName: z.string().optional(),
		label: z.string().optional(),
		channel: z.string().optional(),
		model: z.string().optional(),
		status: z.string().optional(),
		chatType: z.string().optional(),
		updatedAt: z.number().nullable().optional(),
		createdAt: z.number().optional(),
	})
	.passthrough();

/** Session entry from sessions.list RPC */
export type RawSession = z.output<typeof RawSessionSchema>;

const SessionsListSchema = z.object({
	sessions: z.array(z.unknown()).default([]),
});

/** Result from sessions.list RPC */
export interface SessionsListResult {
	sessions: RawSession[];
	/** Entries without a usable key */
	skipped: number;
}

/** List gateway sessions; entries that fail validation are counted, not returned */
export async function listSessions(
	client: GatewayRequester,
	options?: { limit?: number },
): Promise<SessionsListResult> {
	const raw = await requestParsed(client, "sessions.list", options ?? {}, SessionsListSchema);
	const sessions: RawSession[] = [];
	let skipped = 0;
	for (const entry of raw.sessions) {
		const parsed = RawSessionSchema.safeParse(entry);
		if (parsed.success) {
			sessions.push({
				...parsed.data,
				label: parsed.data.displayName ?? parsed.data.label ?? parsed.data.key,
			});
		} else {
			skipped++;
		}
	}
	return { sessions, skipped };
}

const DeleteSchema = z.object({ deleted: z.boolean(), key: z.string() }).passthrough();
const PreviewSchema = z.object({ key: z.string(), summary: z.string() }).passthrough();
const ResetSchema = z.object({ key: z.string(), reset: z.boolean() }).passthrough();

/** Delete a gateway session */
export function deleteSession(
	client: GatewayRequester,
	key: string,
): Promise<z.output<typeof DeleteSchema>> {
	return requestParsed(client, "sessions.delete", { key }, DeleteSchema);
}

/** Preview a gateway session (summary) */
export function previewSession(
	client: GatewayRequester,
	key: string,
): Promise<z.output<typeof PreviewSchema>> {
	return requestParsed(client, "sessions.preview", { key }, PreviewSchema);
}

/** Reset a gateway session (clear messages, keep metadata) */
export function resetSession(
	client: GatewayRequester,
	key: string,
): Promise<z.output<typeof ResetSchema>> {
	return requestParsed(client, "sessions.reset", { key }, ResetSchema);
}
