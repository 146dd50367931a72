import type { SensorConfig } from "../lib/config";

/** One sample of the battery rail. Positive current means the battery is discharging. */
export interface SensorReading {
	voltage: number; // V
	current: number; // A
	power: number; // W
}

/**
 * PowerSensor is the contract every battery-rail driver follows.
 * - type: driver identifier used in config.json (`ina.driver`)
 * - readPower: one-shot read; throws a DaemonError on I/O or range failures
 * - close: release the underlying bus
 */
export interface PowerSensor {
	readonly type: string;

	readPower(): Promise<SensorReading>;

	close(): Promise<void>;
}

export type PowerSensorFactory = (config: SensorConfig) => Promise<PowerSensor>;

/**
 * CPU health readings exposed by the OS. Both return null when no source is available.
 */
export interface SystemSensors {
	readTemperature(): Promise<number | null>;

	readThrottleState(): Promise<number | null>;
}
