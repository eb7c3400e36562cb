import type { z } from "zod";

/** Anything that can issue gateway requests */
export interface GatewayRequester {
	request(method: string, params: unknown): Promise<unknown>;
}

/** Validate an RPC payload; a shape mismatch is an error, not a default */
export async function requestParsed<S extends z.ZodTypeAny>(
	client: GatewayRequester,
	method: string,
	params: unknown,
	schema: S,
): Promise<z.output<S>> {
	const payload = await client.request(method, params);
	const parsed = schema.safeParse(payload);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
		throw new Error(`Unexpected ${method} response: ${where}${issue?.message ?? "invalid"}`);
	}
	return parsed.data;
}
