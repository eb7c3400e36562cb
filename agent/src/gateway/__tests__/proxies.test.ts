import { describe, expect, it } from "vitest";
import {
	getGatewayStatus,
	getHealth,
	getUsageCost,
	getUsageStatus,
	pollLogsTail,
} from "../diagnostics-proxy.js";
import type { GatewayRequester } from "../requester.js";
import { deleteSession, listSessions, previewSession, resetSession } from "../sessions-proxy.js";

interface Call {
	method: string;
	params: unknown;
}

/** In-memory requester answering from a method → payload table */
function fakeRequester(answers: Record<string, unknown>): GatewayRequester & { calls: Call[] } {
	const calls: Call[] = [];
	return {
		calls,
		request: async (method, params) => {
			calls.push({ method, params });
			if (!(method in answers)) throw new Error(`Unknown: ${method}`);
			return answers[method];
		},
	};
}

describe("diagnostics-proxy", () => {
	it("getHealth keeps extra fields", async () => {
		const client = fakeRequester({
			health: { status: "ok", uptime: 86400, version: "1.2.3", channels: {}, build: "abc" },
		});
		const health = await getHealth(client);
		expect(health).toMatchObject({ status: "ok", uptime: 86400, version: "1.2.3", build: "abc" });
		expect(client.calls).toEqual([{ method: "health", params: {} }]);
	});

	it("getUsageStatus and getUsageCost fill numeric defaults", async () => {
		const client = fakeRequester({
			"usage.status": { totalRequests: 150, activeProviders: ["local", "remote"] },
			"usage.cost": { totalCost: 1.23 },
		});
		expect(await getUsageStatus(client)).toEqual({
			totalRequests: 150,
			totalTokens: 0,
			activeProviders: ["local", "remote"],
		});
		expect(await getUsageCost(client)).toEqual({ totalCost: 1.23, breakdown: [] });
	});

	it("getGatewayStatus validates the payload", async () => {
		await expect(getGatewayStatus(fakeRequester({ status: { gateway: "x" } }))).rejects.toThrow(
			"Unexpected status response: status: Required",
		);
		expect(
			await getGatewayStatus(fakeRequester({ status: { status: "running", connectedClients: 3 } })),
		).toEqual({ status: "running", connectedClients: 3 });
	});

	it("pollLogsTail passes the cursor only when given", async () => {
		const client = fakeRequester({
			"logs.tail": { file: "/tmp/gateway.log", cursor: 1000, size: 1000, lines: ["line"] },
		});
		await pollLogsTail(client);
		await pollLogsTail(client, 1000);
		expect(client.calls.map((c) => c.params)).toEqual([{}, { cursor: 1000 }]);
	});
});

describe("sessions-proxy", () => {
	it("listSessions labels sessions and skips malformed entries", async () => {
		const client = fakeRequester({
			"sessions.list": {
				sessions: [
					{ key: "agent:main:main", displayName: "Main", updatedAt: 10 },
					{ key: "agent:main:sub:1", label: "Research" },
					{ key: "agent:main:sub:2" },
					{ displayName: "no key" },
				],
			},
		});
		const result = await listSessions(client, { limit: 10 });
		expect(result.skipped).toBe(1);
		expect(result.sessions.map((s) => s.label)).toEqual(["Main", "Research", "agent:main:sub:2"]);
		expect(client.calls[0]).toEqual({ method: "sessions.list", params: { limit: 10 } });
	});

	it("listSessions tolerates a missing sessions array", async () => {
		expect(await listSessions(fakeRequester({ "sessions.list": {} }))).toEqual({
			sessions: [],
			skipped: 0,
		});
	});

	it("session actions send the key", async () => {
		const client = fakeRequester({
			"sessions.delete": { deleted: true, key: "k" },
			"sessions.preview": { key: "k", summary: "hello" },
			"sessions.reset": { key: "k", reset: true },
		});
		expect(await deleteSession(client, "k")).toEqual({ deleted: true, key: "k" });
		expect(await previewSession(client, "k")).toEqual({ key: "k", summary: "hello" });
		expect(await resetSession(client, "k")).toEqual({ key: "k", reset: true });
		expect(client.calls.map((c) => c.params)).toEqual([{ key: "k" }, { key: "k" }, { key: "k" }]);
	});
});
