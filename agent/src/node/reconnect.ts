import { errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import type { ConnectionStatus, PairingChange, PairingStatus, StatusChange } from "./node-client.js";

export interface ReconnectPolicy {
	enabled: boolean;
	baseDelayMs: number;
	maxDelayMs: number;
	maxAttempts: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
	enabled: true,
	baseDelayMs: 1_000,
	maxDelayMs: 30_000,
	maxAttempts: 10,
};

/** The part of NodeClient the reconnector drives */
export interface ReconnectTarget {
	readonly pairingStatus: PairingStatus;
	connect(): Promise<ConnectionStatus>;
	onStatusChange(handler: (change: StatusChange) => void): () => void;
	onPairingChange(handler: (change: PairingChange) => void): () => void;
}

export interface Reconnector {
	readonly attempts: number;
	/** A retry timer is armed */
	readonly scheduled: boolean;
	stop(): void;
}

export function backoffDelay(policy: ReconnectPolicy, attempt: number): number {
	return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * Retries unexpected disconnects with bounded exponential backoff.
 * While pairing is pending it keeps retrying at the maximum delay without
 * spending attempts. Requested disconnects, a rejected pairing and stop()
 * end the retries; a successful connection resets the attempt count.
 */
export function createReconnector(
	client: ReconnectTarget,
	policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY,
	logger: NodeLogger = nullLogger,
): Reconnector {
	let attempts = 0;
	let timer: ReturnType<typeof setTimeout> | null = null;
	let stopped = !policy.enabled;

	const cancel = () => {
		if (timer) {
			clearTimeout(timer);
			timer = null;
		}
	};

	const arm = (delay: number) => {
		timer = setTimeout(() => {
			timer = null;
			client.connect().catch((err: unknown) => {
				logger.error("Reconnect failed", { error: errorMessage(err) });
			});
		}, delay);
	};

	const schedule = () => {
		if (stopped || timer) return;
		// awaiting approval: poll at the cap, outside the attempt budget
		if (client.pairingStatus === "pending") {
			logger.info(`Pairing pending, retrying in ${policy.maxDelayMs}ms`);
			arm(policy.maxDelayMs);
			return;
		}
		if (attempts >= policy.maxAttempts) {
			logger.warn(`Giving up after ${attempts} reconnect attempts`);
			return;
		}
		const delay = backoffDelay(policy, attempts);
		attempts++;
		logger.info(`Reconnecting in ${delay}ms (attempt ${attempts}/${policy.maxAttempts})`);
		arm(delay);
	};

	const unsubscribeStatus = client.onStatusChange((change) => {
		if (change.status === "connected") {
			attempts = 0;
			cancel();
			return;
		}
		if (change.status !== "disconnected" && change.status !== "error") return;
		if (change.requested) {
			cancel();
			return;
		}
		if (client.pairingStatus === "rejected") return;
		schedule();
	});

	const unsubscribePairing = client.onPairingChange((change) => {
		if (change.status === "rejected") {
			logger.warn("Pairing rejected, not reconnecting");
			cancel();
		}
	});

	return {
		get attempts() {
			return attempts;
		},
		get scheduled() {
			return timer !== null;
		},
		stop() {
			stopped = true;
			cancel();
			unsubscribeStatus();
			unsubscribePairing();
		},
	};
}
