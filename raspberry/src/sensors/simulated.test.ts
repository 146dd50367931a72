import { describe, expect, it } from "vitest";

import { openPowerSensor } from "./index";
import { SimulatedPowerSensor } from "./simulated";

const HOUR = 60 * 60 * 1000;

describe("SimulatedPowerSensor", () => {
	it("discharges from full during the first hour", async () => {
		const sensor = new SimulatedPowerSensor(() => 0, () => 0.5);
		const reading = await sensor.readPower();
		expect(reading.voltage).toBe(4.15);
		expect(reading.current).toBe(0.35);
		expect(reading.power).toBeCloseTo(1.4525, 2);
	});

	it("charges during the second hour", async () => {
		const sensor = new SimulatedPowerSensor(() => HOUR, () => 0.5);
		const reading = await sensor.readPower();
		expect(reading.voltage).toBe(3.3);
		expect(reading.current).toBe(-0.45);
	});
});

describe("openPowerSensor", () => {
	it("opens the simulated driver", async () => {
		const sensor = await openPowerSensor({ driver: "simulated", busNumber: 1, address: 0x40, shuntOhms: 0.05, maxExpectedAmps: 5.5, monitorInterval: 5 });
		expect(sensor.type).toBe("simulated");
		await sensor.close();
	});
});
