/** A gateway `res` frame that came back with ok:false */
export class GatewayRequestError extends Error {
	readonly code: string;
	readonly details?: unknown;

	constructor(code: string, message: string, details?: unknown) {
		super(message);
		this.name = "GatewayRequestError";
		this.code = code;
		this.details = details;
	}
}

/** Identity accessed before initialize() */
export class IdentityNotInitializedError extends Error {
	constructor() {
		super("Device not initialized");
		this.name = "IdentityNotInitializedError";
	}
}

/** Two capabilities claiming the same category or command */
export class CapabilityConflictError extends Error {
	readonly command: string;

	constructor(command: string, message: string) {
		super(message);
		this.name = "CapabilityConflictError";
		this.command = command;
	}
}

/** Raised by a camera provider when the OS refuses access to the device */
export class CameraPermissionError extends Error {
	constructor(message = "Camera access denied") {
		super(message);
		this.name = "CameraPermissionError";
	}
}

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);
const PERMISSION_NAMES = new Set([
	"CameraPermissionError",
	"NotAllowedError",
	"PermissionDeniedError",
]);

export function isPermissionDenied(err: unknown): boolean {
	if (err instanceof CameraPermissionError) return true;
	if (!(err instanceof Error)) return false;
	if (PERMISSION_NAMES.has(err.name)) return true;
	return (
		"code" in err &&
		typeof err.code === "string" &&
		PERMISSION_CODES.has(err.code)
	);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
