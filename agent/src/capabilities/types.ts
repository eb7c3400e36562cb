/** Loosely-typed argument bag carried by an invoke request */
export type ArgBag = Record<string, unknown>;

/** Gateway → node request to run one command */
export interface InvokeRequest {
	id: string;
	command: string;
	args?: ArgBag | null;
}

/** Node → gateway answer; exactly one per request, echoing its id */
export interface InvokeResponse {
	id: string;
	ok: boolean;
	payload?: unknown;
	error?: string;
}

export interface NodeCapability {
	/** canvas, camera, screen, system */
	readonly category: string;
	readonly commands: readonly string[];
	canHandle(command: string): boolean;
	execute(request: InvokeRequest): Promise<InvokeResponse>;
}

/** What the node announces to the gateway once paired */
export interface NodeRegistration {
	capabilities: string[];
	commands: string[];
	permissions: Record<string, boolean>;
	platform: string;
	displayName: string;
	version: string;
}
