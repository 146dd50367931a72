import type { Command } from "@redreactor/common";

export type Component = "sensor" | "binary_sensor" | "number" | "button";

interface EntityBase {
	field: string;
	pretty: string;
	deviceClass?: string;
	entityCategory?: "diagnostic" | "config";
	unit?: string;
}

export interface SensorEntity extends EntityBase {
	component: "sensor";
	precision?: number;
}

export interface BinarySensorEntity extends EntityBase {
	component: "binary_sensor";
}

export interface NumberEntity extends EntityBase {
	component: "number";
	field: Command;
	min: number;
	max: number;
	step: number;
	mode: "box" | "slider" | "auto";
}

export interface ButtonEntity extends EntityBase {
	component: "button";
	field: Command;
}

export type Entity = SensorEntity | BinarySensorEntity | NumberEntity | ButtonEntity;

export const ENTITIES: readonly Entity[] = [
	{ component: "sensor", field: "voltage", pretty: "Voltage", unit: "V", deviceClass: "voltage", precision: 2 },
	{ component: "sensor", field: "current", pretty: "Current", unit: "A", deviceClass: "current", precision: 3 },
	{ component: "sensor", field: "battery_level", pretty: "Battery Level", unit: "%", deviceClass: "battery" },
	{
		component: "binary_sensor",
		field: "external_power",
		pretty: "External Power",
		deviceClass: "plug",
		entityCategory: "diagnostic"
	},
	{
		component: "sensor",
		field: "cpu_temperature",
		pretty: "CPU Temperature",
		unit: "°C",
		deviceClass: "temperature",
		entityCategory: "diagnostic",
		precision: 2
	},
	{ component: "sensor", field: "cpu_stat", pretty: "CPU Stat", entityCategory: "diagnostic" },
	{
		component: "number",
		field: "battery_warning_threshold",
		pretty: "Battery Warning",
		unit: "%",
		deviceClass: "battery",
		entityCategory: "config",
		min: 0,
		max: 100,
		step: 1,
		mode: "box"
	},
	{
		component: "number",
		field: "battery_voltage_minimum",
		pretty: "Battery Voltage Minimum",
		unit: "V",
		deviceClass: "voltage",
		entityCategory: "config",
		min: 2.5,
		max: 4.5,
		step: 0.1,
		mode: "box"
	},
	{
		component: "number",
		field: "battery_voltage_maximum",
		pretty: "Battery Voltage Maximum",
		unit: "V",
		deviceClass: "voltage",
		entityCategory: "config",
		min: 2.5,
		max: 4.5,
		step: 0.1,
		mode: "box"
	},
	{
		component: "number",
		field: "report_interval",
		pretty: "Report Interval",
		unit: "s",
		entityCategory: "config",
		min: 5,
		max: 300,
		step: 5,
		mode: "box"
	},
	{ component: "button", field: "restart", pretty: "Restart", deviceClass: "restart", entityCategory: "config" },
	{ component: "button", field: "shutdown", pretty: "Shutdown", entityCategory: "config" }
];
