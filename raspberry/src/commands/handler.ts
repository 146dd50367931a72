import type { Logger } from "winston";
import { FloatPayloadSchema, IntegerPayloadSchema, isActionCommand, isSettingCommand } from "@redreactor/common";
import type { ActionCommand, SettingCommand } from "@redreactor/common";
import type { z } from "zod";

import type { Channel } from "../lib/channel";
import { DaemonError, commandRejected, errorMessage } from "../lib/errors";
import type { DynamicSettings, SettingsSnapshot } from "../lib/snapshot";
import type { CommandMessage } from "../mqtt/broker";

export interface ActionTarget {
	shutdown(reason: string): Promise<boolean>;
	restart(reason: string): Promise<boolean>;
}

interface SettingRule {
	field: keyof DynamicSettings;
	schema: z.ZodType<number, z.ZodTypeDef, string>;
}

const SETTING_RULES: Record<SettingCommand, SettingRule> = {
	battery_warning_threshold: { field: "batteryWarningThreshold", schema: IntegerPayloadSchema },
	battery_voltage_minimum: { field: "batteryVoltageMinimum", schema: FloatPayloadSchema },
	battery_voltage_maximum: { field: "batteryVoltageMaximum", schema: FloatPayloadSchema },
	report_interval: { field: "reportInterval", schema: IntegerPayloadSchema }
};

export type CommandOutcome = "applied" | "rejected" | "ignored" | "action";

/**
 * Applies Command Messages from the broker to the settings snapshot or the system controller.
 */
export class CommandHandler {
	constructor(
		private readonly settings: SettingsSnapshot,
		private readonly actions: ActionTarget,
		private readonly logger: Logger
	) {}

	/** Drain the channel until it is closed. A failing command never ends the loop. */
	async run(channel: Channel<CommandMessage>): Promise<void> {
		for await (const msg of channel) {
			try {
				await this.handle(msg);
			} catch (err) {
				this.logger.error("Command '%s' failed: %s", msg.command, errorMessage(err));
			}
		}
		this.logger.debug("Command channel closed");
	}

	async handle(msg: CommandMessage): Promise<CommandOutcome> {
		const { command, payload } = msg;

		if (isSettingCommand(command)) {
			try {
				this.applySetting(command, payload);
				return "applied";
			} catch (err) {
				if (err instanceof DaemonError && err.code === "COMMAND_REJECTED") {
					this.logger.warn("Rejected %s=%j: %s", command, payload, err.message);
					return "rejected";
				}
				throw err;
			}
		}

		if (isActionCommand(command)) {
			await this.runAction(command);
			return "action";
		}

		this.logger.debug("Ignoring unknown command '%s'", command);
		return "ignored";
	}

	private applySetting(command: SettingCommand, payload: string): void {
		const rule = SETTING_RULES[command];
		const parsed = rule.schema.safeParse(payload);
		if (!parsed.success) {
			throw commandRejected(parsed.error.issues.map(i => i.message).join("; "), payload);
		}

		const patch: Partial<DynamicSettings> = {};
		patch[rule.field] = parsed.data;
		this.settings.update(patch);
		this.logger.info("Setting %s updated to %d", command, parsed.data);
	}

	private async runAction(command: ActionCommand): Promise<void> {
		const reason = `${command} command received over MQTT`;
		if (command === "shutdown") {
			await this.actions.shutdown(reason);
		} else {
			await this.actions.restart(reason);
		}
	}
}
