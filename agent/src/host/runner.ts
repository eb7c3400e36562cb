import { buildA2UIHostUrl } from "../canvas/a2ui.js";
import { createCanvasHandlers } from "../canvas/surface.js";
import { CameraCapability } from "../capabilities/camera.js";
import { CanvasCapability } from "../capabilities/canvas.js";
import { ScreenCapability } from "../capabilities/screen.js";
import { SystemCapability } from "../capabilities/system.js";
import type { NodeConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { IdentityStore } from "../identity/device-identity.js";
import { createLogger } from "../logger.js";
import { NodeClient } from "../node/node-client.js";
import { type Reconnector, createReconnector } from "../node/reconnect.js";
import type { HostBridge } from "./bridge.js";
import type { HostCommand } from "./protocol.js";

export interface NodeHost {
	identity: IdentityStore;
	client: NodeClient;
	reconnector: Reconnector;
	start(): Promise<void>;
	stop(): void;
}

/**
 * Wires identity, the four capabilities and the node client to a host
 * bridge. State changes are forwarded to the host as status and pairing
 * lines; connect and disconnect lines from the host drive the client.
 */
export function createNodeHost(config: NodeConfig, bridge: HostBridge): NodeHost {
	const identity = new IdentityStore(config.dataDir, createLogger("Identity"));
	identity.initialize();

	const client = new NodeClient({
		gatewayUrl: config.gatewayUrl,
		token: config.token,
		identity,
		clientId: config.clientId,
		displayName: config.displayName,
		platform: config.platform,
		version: config.version,
		permissions: config.permissions,
		logger: createLogger("NodeClient"),
	});

	client.registerCapability(
		new SystemCapability({
			onNotify: (args) =>
				bridge.send({
					type: "notify",
					title: args.title,
					body: args.body,
					...(args.subtitle !== undefined ? { subtitle: args.subtitle } : {}),
					sound: args.playSound,
				}),
			logger: createLogger("System"),
		}),
	);
	client.registerCapability(
		new CanvasCapability({
			handlers: createCanvasHandlers(bridge.canvas, {
				a2uiHostUrl: () => buildA2UIHostUrl(client.gatewayUrl),
				logger: createLogger("Canvas"),
			}),
			logger: createLogger("Canvas"),
		}),
	);
	client.registerCapability(
		new ScreenCapability({ provider: bridge.screen, logger: createLogger("Screen") }),
	);
	client.registerCapability(
		new CameraCapability({ provider: bridge.camera, logger: createLogger("Camera") }),
	);

	const reconnector = createReconnector(client, config.reconnect, createLogger("Reconnect"));
	const logger = createLogger("NodeHost");

	const unsubscribers = [
		client.onStatusChange((change) =>
			bridge.send({
				type: "status",
				status: change.status,
				...(change.error !== undefined ? { error: change.error } : {}),
			}),
		),
		client.onPairingChange((change) => bridge.send({ type: "pairing", ...change })),
		bridge.onCommand((command: HostCommand) => {
			if (command.type === "disconnect") {
				client.disconnect();
				return;
			}
			if (command.gatewayUrl && command.gatewayUrl !== client.gatewayUrl) {
				client.disconnect();
				client.gatewayUrl = command.gatewayUrl;
			}
			client.connect().catch((err: unknown) => {
				logger.error("Connect failed", { error: errorMessage(err) });
			});
		}),
	];

	return {
		identity,
		client,
		reconnector,
		async start() {
			bridge.send({ type: "ready", deviceId: identity.deviceId, version: config.version });
			logger.info(`Node ${identity.shortDeviceId}... starting`, {
				gatewayUrl: config.gatewayUrl,
				commands: client.registry.commands.length,
			});
			await client.connect();
		},
		stop() {
			reconnector.stop();
			for (const unsubscribe of unsubscribers) unsubscribe();
			client.disconnect();
			bridge.close();
		},
	};
}
