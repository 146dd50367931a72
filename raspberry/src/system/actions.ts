import { exec } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "winston";
import type { DeviceTopics } from "@redreactor/common";

import type { StaticConfig } from "../lib/config";
import { errorMessage, systemActionError } from "../lib/errors";
import type { Publisher } from "../mqtt/broker";

const execAsync = promisify(exec);

export type SystemAction = "shutdown" | "restart";

/** Runs an OS command line, rejecting when it exits non-zero. */
export type CommandRunner = (command: string) => Promise<void>;

export const shellRunner: CommandRunner = async command => {
	await execAsync(command, { timeout: 30000 });
};

export interface SystemControllerOptions {
	system: StaticConfig["system"];
	status: StaticConfig["status"];
	topics: DeviceTopics;
	publisher: Publisher;
	logger: Logger;
	runner?: CommandRunner;
}

export type ActionListener = (action: SystemAction, reason: string) => void;

/**
 * Powers the host off or reboots it. While an action is under way every other shutdown or
 * restart request is ignored. A shutdown holds that flag until the process exits; a restart
 * whose command fails releases it, announces `online` again and tells the abort listeners so
 * monitoring carries on.
 */
export class SystemController {
	private pending: SystemAction | null = null;
	private readonly runner: CommandRunner;
	private readonly listeners = new Set<ActionListener>();
	private readonly abortListeners = new Set<ActionListener>();

	constructor(private readonly opts: SystemControllerOptions) {
		this.runner = opts.runner ?? shellRunner;
	}

	get inProgress(): SystemAction | null {
		return this.pending;
	}

	onAction(listener: ActionListener): void {
		this.listeners.add(listener);
	}

	/** Called when a failed restart hands control back to the daemon. */
	onAbort(listener: ActionListener): void {
		this.abortListeners.add(listener);
	}

	shutdown(reason: string): Promise<boolean> {
		return this.perform("shutdown", reason);
	}

	restart(reason: string): Promise<boolean> {
		return this.perform("restart", reason);
	}

	/**
	 * Resolves true when the OS command was started successfully, false when another action
	 * was already in progress or the command failed.
	 */
	private async perform(action: SystemAction, reason: string): Promise<boolean> {
		const { logger, publisher, topics, status, system } = this.opts;

		if (this.pending) {
			logger.debug("Ignoring %s request (%s): %s already in progress", action, reason, this.pending);
			return false;
		}
		this.pending = action;

		logger.warn("System %s requested: %s", action, reason);
		this.notify(this.listeners, action, reason);

		const acked = await publisher.publishAndWait(topics.status, status.offline, { qos: 1, retain: true }, system.offlineGraceMs);
		if (!acked) {
			logger.warn("Offline status not confirmed by broker before %s", action);
		}

		const command = action === "shutdown" ? system.shutdown : system.restart;
		try {
			await this.runner(command);
			logger.info("Executed '%s'", command);
			return true;
		} catch (err) {
			const e = systemActionError(`System ${action} command '${command}' failed: ${errorMessage(err)}`, err);
			logger.error("[%s] %s", e.code, e.message);
			if (action === "restart") {
				this.abortRestart(reason);
			}
			return false;
		}
	}

	private abortRestart(reason: string): void {
		const { logger, publisher, topics, status } = this.opts;

		this.pending = null;
		logger.warn("Restart abandoned, monitoring continues");
		if (!publisher.publish(topics.status, status.online, { qos: 1, retain: true })) {
			logger.debug("Broker not connected, online status not restored");
		}
		this.notify(this.abortListeners, "restart", reason);
	}

	private notify(listeners: Set<ActionListener>, action: SystemAction, reason: string): void {
		for (const listener of listeners) {
			try {
				listener(action, reason);
			} catch (err) {
				this.opts.logger.error("Action listener failed: %s", errorMessage(err));
			}
		}
	}
}
