export { buildA2UIHostUrl, isTrustedA2UIUrl, splitJsonlMessages } from "./canvas/a2ui.js";
export { type CanvasSurface, createCanvasHandlers } from "./canvas/surface.js";
export { CameraCapability, type CameraProvider } from "./capabilities/camera.js";
export { CanvasCapability, type CanvasHandlers } from "./capabilities/canvas.js";
export { CapabilityRegistry } from "./capabilities/registry.js";
export { ScreenCapability, type ScreenProvider } from "./capabilities/screen.js";
export { SystemCapability } from "./capabilities/system.js";
export type {
	InvokeRequest,
	InvokeResponse,
	NodeCapability,
	NodeRegistration,
} from "./capabilities/types.js";
export { type NodeConfig, loadConfig } from "./config.js";
export * from "./errors.js";
export { GatewayClient } from "./gateway/client.js";
export {
	getGatewayStatus,
	getHealth,
	getUsageCost,
	getUsageStatus,
	pollLogsTail,
} from "./gateway/diagnostics-proxy.js";
export * from "./gateway/models.js";
export {
	deleteSession,
	listSessions,
	previewSession,
	resetSession,
} from "./gateway/sessions-proxy.js";
export { HostBridge } from "./host/bridge.js";
export { type NodeHost, createNodeHost } from "./host/runner.js";
export { IdentityStore } from "./identity/device-identity.js";
export { Logger, type NodeLogger, createLogger } from "./logger.js";
export {
	type ConnectionStatus,
	NodeClient,
	type PairingStatus,
} from "./node/node-client.js";
export { createReconnector, type ReconnectPolicy } from "./node/reconnect.js";
