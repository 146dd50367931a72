import type { SensorConfig } from "../lib/config";
import { configError, sensorError, sensorRangeError } from "../lib/errors";
import type { PowerSensor, SensorReading } from "./types";

/**
 * Subset of i2c-bus' PromisifiedBus the driver needs. SMBus words are little-endian on the
 * wire, the INA219 registers are big-endian, so every word is byte-swapped.
 */
export interface I2cWordBus {
	readWord(address: number, command: number): Promise<number>;
	writeWord(address: number, command: number, word: number): Promise<void>;
	close(): Promise<void>;
}

export type I2cBusOpener = (busNumber: number) => Promise<I2cWordBus>;

const REG_CONFIG = 0x00;
const REG_BUS_VOLTAGE = 0x02;
const REG_POWER = 0x03;
const REG_CURRENT = 0x04;
const REG_CALIBRATION = 0x05;

// 16 V bus range, 12-bit bus and shunt ADC, continuous shunt + bus conversion.
const CONFIG_BUS_RANGE_16V = 0x0000;
const CONFIG_BADC_12BIT = 0x0180;
const CONFIG_SADC_12BIT = 0x0018;
const CONFIG_MODE_CONTINUOUS = 0x0007;

// PGA gain settings keyed by the full-scale shunt voltage (in microvolts) they cover.
const GAINS: readonly { maxShuntMicrovolts: number; bits: number }[] = [
	{ maxShuntMicrovolts: 40_000, bits: 0x0000 },
	{ maxShuntMicrovolts: 80_000, bits: 0x0800 },
	{ maxShuntMicrovolts: 160_000, bits: 0x1000 },
	{ maxShuntMicrovolts: 320_000, bits: 0x1800 }
];

const BUS_VOLTAGE_LSB = 0.004;
const CALIBRATION_SCALE = 0.04096;

export interface Ina219Calibration {
	calibration: number;
	currentLsb: number; // A per bit
	powerLsb: number; // W per bit
	config: number;
}

export function swapWord(word: number): number {
	return ((word & 0xff) << 8) | ((word >> 8) & 0xff);
}

function toSigned16(word: number): number {
	return word > 0x7fff ? word - 0x10000 : word;
}

export function computeCalibration(shuntOhms: number, maxExpectedAmps: number): Ina219Calibration {
	const maxShuntVolts = shuntOhms * maxExpectedAmps;
	// compared in whole microvolts: 0.1 * 0.4 is 0.04000000000000001 in floating point
	const maxShuntMicrovolts = Math.round(maxShuntVolts * 1e6);
	const gain = GAINS.find(g => maxShuntMicrovolts <= g.maxShuntMicrovolts);
	if (!gain) {
		throw configError(
			`ina219: shunt voltage ${maxShuntVolts.toFixed(3)}V exceeds the 0.32V measuring range (shuntOhms=${shuntOhms}, maxExpectedAmps=${maxExpectedAmps})`
		);
	}

	const nominalLsb = maxExpectedAmps / 32768;
	const calibration = Math.min(Math.trunc(CALIBRATION_SCALE / (nominalLsb * shuntOhms)), 0xfffe);
	const currentLsb = CALIBRATION_SCALE / (calibration * shuntOhms);

	return {
		calibration,
		currentLsb,
		powerLsb: currentLsb * 20,
		config: CONFIG_BUS_RANGE_16V | gain.bits | CONFIG_BADC_12BIT | CONFIG_SADC_12BIT | CONFIG_MODE_CONTINUOUS
	};
}

async function openI2cBus(busNumber: number): Promise<I2cWordBus> {
	try {
		const i2c = await import("i2c-bus");
		return await i2c.openPromisified(busNumber);
	} catch (err) {
		throw sensorError(`Unable to open I2C bus ${busNumber}`, err);
	}
}

/**
 * INA219 high-side current/power monitor on the Red Reactor board.
 */
export class Ina219Sensor implements PowerSensor {
	readonly type = "ina219";

	private constructor(
		private readonly bus: I2cWordBus,
		private readonly address: number,
		private readonly cal: Ina219Calibration
	) {}

	static async open(config: SensorConfig, openBus: I2cBusOpener = openI2cBus): Promise<Ina219Sensor> {
		const cal = computeCalibration(config.shuntOhms, config.maxExpectedAmps);
		const bus = await openBus(config.busNumber);
		const sensor = new Ina219Sensor(bus, config.address, cal);

		try {
			await sensor.configure();
		} catch (err) {
			await bus.close();
			throw sensorError(`Unable to configure INA219 at 0x${config.address.toString(16)}`, err);
		}

		return sensor;
	}

	private async write(register: number, value: number): Promise<void> {
		await this.bus.writeWord(this.address, register, swapWord(value));
	}

	private async read(register: number): Promise<number> {
		return swapWord(await this.bus.readWord(this.address, register));
	}

	private async configure(): Promise<void> {
		await this.write(REG_CONFIG, this.cal.config);
		await this.write(REG_CALIBRATION, this.cal.calibration);
	}

	async readPower(): Promise<SensorReading> {
		let busRaw: number;
		let currentRaw: number;
		let powerRaw: number;

		try {
			// The calibration register is cleared by a brown-out; rewrite it before each sample.
			await this.write(REG_CALIBRATION, this.cal.calibration);
			busRaw = await this.read(REG_BUS_VOLTAGE);
			currentRaw = await this.read(REG_CURRENT);
			powerRaw = await this.read(REG_POWER);
		} catch (err) {
			throw sensorError("INA219 read failed", err);
		}

		if (busRaw & 0x0001) {
			throw sensorRangeError("INA219 math overflow: current out of measuring range", { busRaw });
		}

		return {
			voltage: (busRaw >> 3) * BUS_VOLTAGE_LSB,
			current: toSigned16(currentRaw) * this.cal.currentLsb,
			power: powerRaw * this.cal.powerLsb
		};
	}

	async close(): Promise<void> {
		await this.bus.close();
	}
}
