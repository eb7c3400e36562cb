import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { ConfigSchema } from "../../config.js";
import {
	type MockGateway,
	type MockGatewayOptions,
	createMockGateway,
} from "../../gateway/__tests__/mock-gateway.js";
import { isRecord } from "../../gateway/types.js";
import { Logger } from "../../logger.js";
import { HostBridge } from "../bridge.js";
import { type NodeHost, createNodeHost } from "../runner.js";

const tempDirs: string[] = [];
const gateways: MockGateway[] = [];
const hosts: NodeHost[] = [];

function setup(options: MockGatewayOptions = {}) {
	const mock = createMockGateway(undefined, options);
	gateways.push(mock);
	const dataDir = mkdtempSync(join(tmpdir(), "desknode-host-"));
	tempDirs.push(dataDir);

	const lines: Record<string, unknown>[] = [];
	const bridge = new HostBridge({
		write: (line) => {
			const parsed: unknown = JSON.parse(line);
			if (isRecord(parsed)) lines.push(parsed);
		},
	});
	const config = ConfigSchema.parse({
		gatewayUrl: mock.url,
		token: "test-token",
		dataDir,
		displayName: "Test Desk",
		platform: "linux",
		reconnect: { enabled: false },
	});
	const host = createNodeHost(config, bridge);
	hosts.push(host);
	return { mock, bridge, host, lines };
}

beforeAll(() => {
	Logger.configure({ level: "error" });
	return () => Logger.reset();
});

afterEach(async () => {
	for (const host of hosts.splice(0)) host.stop();
	await Promise.all(gateways.splice(0).map((g) => g.close()));
	for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("createNodeHost", () => {
	it("announces itself, connects and registers all four capabilities", async () => {
		const { mock, host, lines } = setup();
		await host.start();

		expect(lines[0]).toEqual({ type: "ready", deviceId: host.identity.deviceId, version: "0.1.0" });
		expect(lines.slice(1)).toEqual([
			{ type: "status", status: "connecting" },
			{ type: "status", status: "connected" },
			{ type: "pairing", status: "paired", deviceId: host.identity.deviceId },
		]);
		const register = await mock.waitForRequest("node.register");
		expect(register.params.capabilities).toEqual(["system", "canvas", "screen", "camera"]);
		expect(register.params.permissions).toEqual({ "camera.capture": true, "screen.record": true });
	});

	it("routes a screen.capture invoke through the host and back", async () => {
		const { mock, bridge, host, lines } = setup();
		await host.start();

		mock.pushEvent("node.invoke.request", {
			id: "inv-9",
			command: "screen.capture",
			args: { format: "jpeg", maxWidth: 800 },
		});
		await expect.poll(() => lines.some((l) => l.type === "provider_request")).toBe(true);
		const request = lines.find((l) => l.type === "provider_request");
		expect(request).toMatchObject({
			method: "screen.capture",
			args: { format: "jpeg", maxWidth: 800, quality: 80, monitorIndex: 0, includePointer: true },
		});

		bridge.handleLine(
			JSON.stringify({
				type: "provider_response",
				requestId: request?.requestId,
				ok: true,
				result: { format: "jpeg", width: 800, height: 450, base64: "QUJD" },
			}),
		);
		const result = await mock.waitForRequest("node.invoke.result");
		expect(result.params).toEqual({
			id: "inv-9",
			ok: true,
			payload: {
				format: "jpeg",
				width: 800,
				height: 450,
				base64: "QUJD",
				image: "data:image/jpeg;base64,QUJD",
			},
			nodeId: host.identity.deviceId,
		});
	});

	it("turns system.notify into a notify line", async () => {
		const { mock, host, lines } = setup();
		await host.start();

		mock.pushEvent("node.invoke.request", {
			id: "inv-10",
			command: "system.notify",
			args: { title: "Build", body: "Green", sound: false },
		});
		await mock.waitForRequest("node.invoke.result");
		expect(lines.find((l) => l.type === "notify")).toEqual({
			type: "notify",
			title: "Build",
			body: "Green",
			sound: false,
		});
	});

	it("reports pending pairing to the host", async () => {
		const { host, lines } = setup({
			connectError: { code: "NOT_PAIRED", message: "device not paired" },
		});
		await host.start();
		expect(lines.slice(1)).toEqual([
			{ type: "status", status: "connecting" },
			{
				type: "pairing",
				status: "pending",
				deviceId: host.identity.deviceId,
				message: "device not paired",
			},
			{ type: "status", status: "disconnected", error: "device not paired" },
		]);
	});

	it("follows connect and disconnect lines from the host", async () => {
		const { bridge, host, lines } = setup();
		await host.start();

		bridge.handleLine('{"type":"disconnect"}');
		expect(host.client.status).toBe("disconnected");
		expect(lines.at(-1)).toEqual({ type: "status", status: "disconnected" });

		bridge.handleLine('{"type":"connect"}');
		await expect.poll(() => host.client.status).toBe("connected");
	});

	it("switches gateways on a connect line with a new url", async () => {
		const first = setup();
		await first.host.start();
		const other = createMockGateway();
		gateways.push(other);

		first.bridge.handleLine(JSON.stringify({ type: "connect", gatewayUrl: other.url }));
		expect(first.host.client.gatewayUrl).toBe(other.url);
		await expect.poll(() => other.connectParams.length).toBe(1);
		await expect.poll(() => first.host.client.status).toBe("connected");
	});
});
