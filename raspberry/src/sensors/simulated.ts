import type { PowerSensor, SensorReading } from "./types";

const CYCLE_MS = 2 * 60 * 60 * 1000;
const EMPTY_VOLTS = 3.3;
const FULL_VOLTS = 4.15;
const DISCHARGE_AMPS = 0.35;
const CHARGE_AMPS = -0.45;

function jitter(max: number, random: () => number): number {
	return (random() * 2 - 1) * max;
}

function round(value: number, decimals: number): number {
	const f = Math.pow(10, decimals);
	return Math.round(value * f) / f;
}

/**
 * Battery rail for development machines without an INA219: the first half of a two-hour cycle
 * discharges from full to nearly empty, the second half charges back up.
 */
export class SimulatedPowerSensor implements PowerSensor {
	readonly type = "simulated";

	constructor(
		private readonly now: () => number = Date.now,
		private readonly random: () => number = Math.random
	) {}

	async readPower(): Promise<SensorReading> {
		const phase = (this.now() % CYCLE_MS) / CYCLE_MS;
		const span = FULL_VOLTS - EMPTY_VOLTS;

		const discharging = phase < 0.5;
		const progress = discharging ? phase / 0.5 : (phase - 0.5) / 0.5;
		const voltage = discharging ? FULL_VOLTS - progress * span : EMPTY_VOLTS + progress * span;
		const current = (discharging ? DISCHARGE_AMPS : CHARGE_AMPS) + jitter(0.02, this.random);

		return {
			voltage: round(voltage, 3),
			current: round(current, 4),
			power: round(voltage * Math.abs(current), 3)
		};
	}

	async close(): Promise<void> {
		// nothing to release
	}
}
