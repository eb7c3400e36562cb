import { errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import type { ArgBag, InvokeRequest, InvokeResponse, NodeCapability } from "./types.js";

/** Handler result before the base class stamps the request id on it */
export type CommandResult = Omit<InvokeResponse, "id">;

export type CommandHandler = (
	args: ArgBag,
	request: InvokeRequest,
) => CommandResult | Promise<CommandResult>;

export function success(payload?: unknown): CommandResult {
	return payload === undefined ? { ok: true } : { ok: true, payload };
}

export function failure(message: string): CommandResult {
	return { ok: false, error: message };
}

/**
 * Base for node capabilities: a fixed command → handler table built once at
 * construction. execute() always answers with the request's id, and a
 * throwing handler turns into an error response.
 */
export abstract class NodeCapabilityBase implements NodeCapability {
	abstract readonly category: string;
	readonly commands: readonly string[];
	protected readonly logger: NodeLogger;
	private readonly table: ReadonlyMap<string, CommandHandler>;

	protected constructor(logger: NodeLogger = nullLogger) {
		this.table = new Map(Object.entries(this.handlers()));
		this.commands = Object.freeze([...this.table.keys()]);
		this.logger = logger;
	}

	/** Called once from the constructor; handlers must not read fields eagerly */
	protected abstract handlers(): Record<string, CommandHandler>;

	canHandle(command: string): boolean {
		return this.table.has(command);
	}

	async execute(request: InvokeRequest): Promise<InvokeResponse> {
		const handler = this.table.get(request.command);
		if (!handler) {
			return { id: request.id, ...failure(`Unknown command: ${request.command}`) };
		}
		try {
			const result = await handler(request.args ?? {}, request);
			return { id: request.id, ...result };
		} catch (err) {
			this.logger.error(`${request.command} failed`, { error: errorMessage(err) });
			return { id: request.id, ...failure(`${request.command} failed: ${errorMessage(err)}`) };
		}
	}
}
