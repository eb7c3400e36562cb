import { errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";
import { getBoolArg, getStringArg } from "./args.js";
import { type CommandHandler, NodeCapabilityBase, success } from "./base.js";
import type { ArgBag } from "./types.js";

export const PRODUCT_NAME = "DeskNode";

export interface SystemNotifyArgs {
	title: string;
	body: string;
	subtitle?: string;
	playSound: boolean;
}

export type NotifyHandler = (args: SystemNotifyArgs) => void;

/** system.notify: asks the UI for a toast; delivery is fire-and-forget */
export class SystemCapability extends NodeCapabilityBase {
	readonly category = "system";
	private notifyHandler: NotifyHandler | null;

	constructor(options: { onNotify?: NotifyHandler; logger?: NodeLogger } = {}) {
		super(options.logger ?? nullLogger);
		this.notifyHandler = options.onNotify ?? null;
	}

	bind(onNotify: NotifyHandler | null): void {
		this.notifyHandler = onNotify;
	}

	protected handlers(): Record<string, CommandHandler> {
		return {
			"system.notify": (args) => this.notify(args),
		};
	}

	private notify(args: ArgBag) {
		const notification: SystemNotifyArgs = {
			title: getStringArg(args, "title", PRODUCT_NAME),
			body: getStringArg(args, "body", ""),
			subtitle: getStringArg(args, "subtitle"),
			playSound: getBoolArg(args, "sound", true),
		};
		this.logger.info(`system.notify: ${notification.title} - ${notification.body}`);

		if (this.notifyHandler) {
			try {
				this.notifyHandler(notification);
			} catch (err) {
				this.logger.warn("Notification handler failed", { error: errorMessage(err) });
			}
		}
		return success({ sent: true });
	}
}
