import { CapabilityConflictError, errorMessage } from "../errors.js";
import type { InvokeRequest, InvokeResponse, NodeCapability } from "./types.js";

/**
 * Routes commands to the one capability that claims them. Ownership is
 * checked at registration, so dispatch never has to pick between two owners.
 */
export class CapabilityRegistry {
	private readonly capabilities: NodeCapability[] = [];
	private readonly owners = new Map<string, NodeCapability>();

	register(capability: NodeCapability): void {
		if (this.capabilities.some((c) => c.category === capability.category)) {
			throw new CapabilityConflictError(
				capability.category,
				`Capability already registered: ${capability.category}`,
			);
		}
		for (const command of capability.commands) {
			const owner = this.owners.get(command);
			if (owner) {
				throw new CapabilityConflictError(
					command,
					`Command ${command} already claimed by ${owner.category}`,
				);
			}
		}
		this.capabilities.push(capability);
		for (const command of capability.commands) {
			this.owners.set(command, capability);
		}
	}

	find(command: string): NodeCapability | undefined {
		return this.owners.get(command);
	}

	get categories(): string[] {
		return this.capabilities.map((c) => c.category);
	}

	/** Every registered command, in registration order */
	get commands(): string[] {
		return this.capabilities.flatMap((c) => [...c.commands]);
	}

	list(): readonly NodeCapability[] {
		return this.capabilities;
	}

	async dispatch(request: InvokeRequest): Promise<InvokeResponse> {
		const capability = this.find(request.command);
		if (!capability) {
			return { id: request.id, ok: false, error: `Unknown command: ${request.command}` };
		}
		try {
			return await capability.execute(request);
		} catch (err) {
			return {
				id: request.id,
				ok: false,
				error: `${request.command} failed: ${errorMessage(err)}`,
			};
		}
	}
}
