import type { SensorConfig } from "../lib/config";
import { configError } from "../lib/errors";
import { Ina219Sensor } from "./ina219";
import { SimulatedPowerSensor } from "./simulated";
import type { PowerSensor, PowerSensorFactory } from "./types";

const registry = new Map<string, PowerSensorFactory>([
	["ina219", config => Ina219Sensor.open(config)],
	["simulated", async () => new SimulatedPowerSensor()]
]);

/**
 * Open the power sensor selected by `ina.driver`.
 * Throws if the driver is unsupported.
 */
export async function openPowerSensor(config: SensorConfig): Promise<PowerSensor> {
	const factory = registry.get(config.driver);
	if (!factory) {
		throw configError(`Unsupported sensor driver '${config.driver}'`);
	}
	return factory(config);
}

export { PiSystemSensors, decodeCpuStat } from "./cpu";
export type { PowerSensor, SensorReading, SystemSensors } from "./types";
