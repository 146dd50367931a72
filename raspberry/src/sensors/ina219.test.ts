import { describe, expect, it } from "vitest";

import type { SensorConfig } from "../lib/config";
import { DaemonError } from "../lib/errors";
import { Ina219Sensor, computeCalibration, swapWord } from "./ina219";
import type { I2cWordBus } from "./ina219";

// Registers hold big-endian values; the fake stores them as the chip would and swaps on the wire.
class FakeBus implements I2cWordBus {
	readonly registers = new Map<number, number>();
	readonly writes: { register: number; value: number }[] = [];
	closed = false;
	failReads = false;

	async readWord(_address: number, register: number): Promise<number> {
		if (this.failReads) throw new Error("EIO");
		return swapWord(this.registers.get(register) ?? 0);
	}

	async writeWord(_address: number, register: number, word: number): Promise<void> {
		const value = swapWord(word);
		this.writes.push({ register, value });
		this.registers.set(register, value);
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

const config: SensorConfig = {
	driver: "ina219",
	busNumber: 1,
	address: 0x40,
	shuntOhms: 0.05,
	maxExpectedAmps: 5.5,
	monitorInterval: 5
};

describe("computeCalibration", () => {
	it("selects the 320mV range for the board shunt", () => {
		const cal = computeCalibration(0.05, 5.5);
		expect(cal.calibration).toBe(4880);
		expect(cal.config).toBe(0x199f);
		expect(cal.currentLsb).toBeCloseTo(0.04096 / (4880 * 0.05), 12);
		expect(cal.powerLsb).toBeCloseTo(cal.currentLsb * 20, 12);
	});

	it("uses the 40mV range for small shunt voltages", () => {
		expect(computeCalibration(0.1, 0.4).config).toBe(0x019f);
	});

	it("keeps a shunt voltage exactly on a range boundary in that range", () => {
		expect(computeCalibration(0.1, 0.8).config).toBe(0x099f);
		expect(computeCalibration(0.1, 3.2).config).toBe(0x199f);
	});

	it("moves to the next range just above a boundary", () => {
		expect(computeCalibration(0.1, 0.41).config).toBe(0x099f);
	});

	it("refuses a range beyond 320mV", () => {
		expect(() => computeCalibration(0.1, 4)).toThrow(DaemonError);
	});
});

describe("swapWord", () => {
	it("exchanges the two bytes", () => {
		expect(swapWord(0x1234)).toBe(0x3412);
		expect(swapWord(0x00ff)).toBe(0xff00);
	});
});

describe("Ina219Sensor", () => {
	it("writes configuration and calibration on open", async () => {
		const bus = new FakeBus();
		await Ina219Sensor.open(config, async () => bus);

		expect(bus.writes).toEqual([
			{ register: 0x00, value: 0x199f },
			{ register: 0x05, value: 4880 }
		]);
	});

	it("converts raw registers", async () => {
		const bus = new FakeBus();
		const sensor = await Ina219Sensor.open(config, async () => bus);
		const cal = computeCalibration(config.shuntOhms, config.maxExpectedAmps);

		// 4.0V => 1000 * 4mV, shifted past the three status bits, conversion ready set
		bus.registers.set(0x02, (1000 << 3) | 0x2);
		bus.registers.set(0x04, 0xff9c); // -100
		bus.registers.set(0x03, 50);

		const reading = await sensor.readPower();
		expect(reading.voltage).toBeCloseTo(4.0, 10);
		expect(reading.current).toBeCloseTo(-100 * cal.currentLsb, 10);
		expect(reading.power).toBeCloseTo(50 * cal.powerLsb, 10);
	});

	it("reports an overflow as a range error", async () => {
		const bus = new FakeBus();
		const sensor = await Ina219Sensor.open(config, async () => bus);
		bus.registers.set(0x02, (1000 << 3) | 0x1);

		await expect(sensor.readPower()).rejects.toMatchObject({ code: "SENSOR_RANGE_ERROR" });
	});

	it("wraps bus failures as sensor errors", async () => {
		const bus = new FakeBus();
		const sensor = await Ina219Sensor.open(config, async () => bus);
		bus.failReads = true;

		await expect(sensor.readPower()).rejects.toMatchObject({ code: "SENSOR_ERROR", message: "INA219 read failed" });
	});

	it("closes the bus when configuration fails", async () => {
		const bus = new FakeBus();
		bus.writeWord = async () => {
			throw new Error("ENXIO");
		};

		await expect(Ina219Sensor.open(config, async () => bus)).rejects.toMatchObject({ code: "SENSOR_ERROR" });
		expect(bus.closed).toBe(true);
	});
});
