import type { ExternalPower, StatePayload } from "@redreactor/common";

import type { DynamicSettings } from "../lib/snapshot";
import type { SensorReading } from "../sensors/types";

// The charger stops topping up a little below the nominal maximum.
export const FULL_VOLTAGE_MARGIN = 0.05;
// Discharge current (A) above which the battery is considered to be the only supply.
export const DISCHARGE_CURRENT_THRESHOLD = 0.01;

export interface CpuInfo {
	temperature: number | null;
	throttleState: number | null;
}

function round(value: number, decimals: number): number {
	const f = Math.pow(10, decimals);
	return Math.round(value * f) / f;
}

/**
 * Battery level in percent, an integer in [0, 100].
 */
export function calculateBatteryLevel(voltage: number, min: number, max: number): number {
	const full = max - FULL_VOLTAGE_MARGIN;
	if (full <= min) {
		return voltage >= max ? 100 : 0;
	}

	const level = ((voltage - min) / (full - min)) * 100;
	return Math.trunc(Math.min(100, Math.max(0, level)));
}

/**
 * ON while a charger or the mains adapter is feeding the board. The INA219 reports positive
 * current when the battery discharges.
 */
export function detectExternalPower(voltage: number, current: number, max: number): ExternalPower {
	if (voltage > max + FULL_VOLTAGE_MARGIN) return "ON";
	return current > DISCHARGE_CURRENT_THRESHOLD ? "OFF" : "ON";
}

export function deriveState(reading: SensorReading, cpu: CpuInfo, settings: Readonly<DynamicSettings>): StatePayload {
	const voltage = round(reading.voltage, 3);
	const current = round(reading.current, 4);

	return {
		voltage,
		current,
		battery_level: calculateBatteryLevel(voltage, settings.batteryVoltageMinimum, settings.batteryVoltageMaximum),
		external_power: detectExternalPower(voltage, current, settings.batteryVoltageMaximum),
		cpu_temperature: cpu.temperature,
		cpu_stat: cpu.throttleState,
		battery_warning_threshold: settings.batteryWarningThreshold,
		battery_voltage_minimum: settings.batteryVoltageMinimum,
		battery_voltage_maximum: settings.batteryVoltageMaximum,
		report_interval: settings.reportInterval
	};
}

export type ShutdownReason = "battery_level" | "voltage";

/**
 * Returns why the system must power off, or null when it may keep running.
 * Nothing is ever triggered while external power is present.
 */
export function evaluateShutdownPolicy(state: StatePayload): ShutdownReason | null {
	if (state.external_power !== "OFF") return null;
	if (state.voltage <= state.battery_voltage_minimum) return "voltage";
	if (state.battery_level <= state.battery_warning_threshold) return "battery_level";
	return null;
}

/** Battery level within the warning zone, regardless of the power source. */
export function inWarningZone(state: StatePayload): boolean {
	return state.battery_level <= state.battery_warning_threshold;
}
