import { z } from "zod";

import { commandRejected } from "./errors";

/**
 * Settings that can be changed at runtime over MQTT and survive restarts.
 */
export interface DynamicSettings {
	batteryWarningThreshold: number;
	batteryVoltageMinimum: number;
	batteryVoltageMaximum: number;
	reportInterval: number;
}

// Node fires any setTimeout/setInterval delay above 2^31-1 ms after 1 ms.
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_INTERVAL_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

export const DynamicSettingsSchema = z
	.object({
		batteryWarningThreshold: z.number().int().min(0).max(100),
		batteryVoltageMinimum: z.number().finite(),
		batteryVoltageMaximum: z.number().finite(),
		reportInterval: z.number().int().positive().max(MAX_INTERVAL_SECONDS)
	})
	.superRefine((s, ctx) => {
		if (s.batteryVoltageMinimum >= s.batteryVoltageMaximum) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["batteryVoltageMinimum"],
				message: "must be lower than batteryVoltageMaximum"
			});
		}
	});

export type SettingsListener = (next: Readonly<DynamicSettings>, previous: Readonly<DynamicSettings>) => void;

/**
 * The single Configuration Snapshot shared by the Monitor Loop and the Command Handler.
 *
 * Readers get a frozen copy; writers replace the whole record in one assignment after the
 * successor has been validated, so a reader observes either the old or the new version.
 */
export class SettingsSnapshot {
	private current: Readonly<DynamicSettings>;
	private readonly listeners = new Set<SettingsListener>();

	constructor(initial: DynamicSettings) {
		this.current = SettingsSnapshot.validate(initial);
	}

	get(): Readonly<DynamicSettings> {
		return this.current;
	}

	/**
	 * Apply a partial update. Throws COMMAND_REJECTED and leaves the snapshot untouched when
	 * the resulting record breaks an invariant.
	 */
	update(patch: Partial<DynamicSettings>): Readonly<DynamicSettings> {
		const previous = this.current;
		const next = SettingsSnapshot.validate({ ...previous, ...patch });
		this.current = next;

		for (const listener of this.listeners) {
			listener(next, previous);
		}

		return next;
	}

	/** Returns an unsubscribe function. */
	onChange(listener: SettingsListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private static validate(candidate: DynamicSettings): Readonly<DynamicSettings> {
		const res = DynamicSettingsSchema.safeParse(candidate);
		if (!res.success) {
			const reason = res.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
			throw commandRejected(reason, candidate);
		}
		return Object.freeze({ ...res.data });
	}
}
