import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { StatePayloadSchema } from "@redreactor/common";

import { calculateBatteryLevel, deriveState, detectExternalPower, evaluateShutdownPolicy } from "./derive";

const settings = {
	batteryWarningThreshold: 10,
	batteryVoltageMinimum: 2.6,
	batteryVoltageMaximum: 4.2,
	reportInterval: 30
};

const cpu = { temperature: 42.5, throttleState: 0 };

describe("calculateBatteryLevel", () => {
	it("maps the usable range linearly", () => {
		expect(calculateBatteryLevel(2.6, 2.6, 4.2)).toBe(0);
		expect(calculateBatteryLevel(4.15, 2.6, 4.2)).toBe(100);
		expect(calculateBatteryLevel(3.4, 2.6, 4.2)).toBe(51);
	});

	it("clamps outside the range", () => {
		expect(calculateBatteryLevel(2.0, 2.6, 4.2)).toBe(0);
		expect(calculateBatteryLevel(4.4, 2.6, 4.2)).toBe(100);
	});

	it("handles a degenerate range without dividing by zero", () => {
		expect(calculateBatteryLevel(4.0, 4.0, 4.05)).toBe(0);
		expect(calculateBatteryLevel(4.05, 4.0, 4.05)).toBe(100);
	});

	it("always yields an integer percentage", () => {
		fc.assert(
			fc.property(
				fc.double({ min: -10, max: 20, noNaN: true }),
				fc.double({ min: 0, max: 5, noNaN: true }),
				fc.double({ min: 0, max: 5, noNaN: true }),
				(voltage, min, max) => {
					const level = calculateBatteryLevel(voltage, min, max);
					return Number.isInteger(level) && level >= 0 && level <= 100;
				}
			)
		);
	});

	it("never decreases as the voltage rises", () => {
		fc.assert(
			fc.property(fc.double({ min: 2, max: 5, noNaN: true }), fc.double({ min: 0, max: 1, noNaN: true }), (v, delta) => {
				return calculateBatteryLevel(v + delta, 2.6, 4.2) >= calculateBatteryLevel(v, 2.6, 4.2);
			})
		);
	});
});

describe("detectExternalPower", () => {
	it("is OFF while the battery discharges", () => {
		expect(detectExternalPower(3.8, 0.25, 4.2)).toBe("OFF");
	});

	it("is ON when current flows into the battery or is negligible", () => {
		expect(detectExternalPower(3.8, -0.3, 4.2)).toBe("ON");
		expect(detectExternalPower(3.8, 0.005, 4.2)).toBe("ON");
	});

	it("is ON while the charger holds the cell above full", () => {
		expect(detectExternalPower(4.3, 0.4, 4.2)).toBe("ON");
	});
});

describe("deriveState", () => {
	it("rounds readings and copies the settings in use", () => {
		const state = deriveState({ voltage: 3.98765, current: 0.123456, power: 0.49 }, cpu, settings);

		expect(state).toEqual({
			voltage: 3.988,
			current: 0.1235,
			battery_level: 89,
			external_power: "OFF",
			cpu_temperature: 42.5,
			cpu_stat: 0,
			battery_warning_threshold: 10,
			battery_voltage_minimum: 2.6,
			battery_voltage_maximum: 4.2,
			report_interval: 30
		});
	});

	it("publishes null CPU values when the OS has none", () => {
		const state = deriveState({ voltage: 4, current: 0, power: 0 }, { temperature: null, throttleState: null }, settings);
		expect(state.cpu_temperature).toBeNull();
		expect(state.cpu_stat).toBeNull();
	});

	it("produces payloads that match the wire schema", () => {
		fc.assert(
			fc.property(
				fc.double({ min: 0, max: 26, noNaN: true }),
				fc.double({ min: -3, max: 3, noNaN: true }),
				fc.integer({ min: 0, max: 100 }),
				(voltage, current, threshold) => {
					const state = deriveState({ voltage, current, power: 0 }, cpu, { ...settings, batteryWarningThreshold: threshold });
					return StatePayloadSchema.safeParse(state).success && state.battery_warning_threshold === threshold;
				}
			)
		);
	});
});

describe("evaluateShutdownPolicy", () => {
	it("requires a shutdown on a flat battery without external power", () => {
		const state = deriveState({ voltage: 2.5, current: 0.5, power: 1.25 }, cpu, settings);
		expect(state.external_power).toBe("OFF");
		expect(evaluateShutdownPolicy(state)).toBe("voltage");
	});

	it("triggers on the warning threshold before the minimum voltage", () => {
		// level 6
		const state = deriveState({ voltage: 2.7, current: 0.5, power: 1.35 }, cpu, settings);
		expect(evaluateShutdownPolicy(state)).toBe("battery_level");
	});

	it("never triggers while external power is present", () => {
		fc.assert(
			fc.property(fc.double({ min: 0, max: 4.25, noNaN: true }), fc.double({ min: -3, max: 0.01, noNaN: true }), (voltage, current) => {
				const state = deriveState({ voltage, current, power: 0 }, cpu, settings);
				return state.external_power === "ON" && evaluateShutdownPolicy(state) === null;
			})
		);
	});

	it("leaves a healthy battery alone", () => {
		const state = deriveState({ voltage: 3.9, current: 0.4, power: 1.56 }, cpu, settings);
		expect(evaluateShutdownPolicy(state)).toBeNull();
	});
});
