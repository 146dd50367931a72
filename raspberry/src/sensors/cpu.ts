import fs from "node:fs/promises";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";

import type { SystemSensors } from "./types";

const execFileAsync = promisify(execFile);

// Throttle bitmask as reported by the firmware (get_throttled).
export const UNDER_VOLTAGE_BIT = 0;
export const FREQ_CAPPED_BIT = 1;
export const THROTTLED_BIT = 2;
export const SOFT_TEMP_LIMIT_BIT = 3;
const OCCURRED_OFFSET = 16;

export const DEFAULT_TEMP_PATHS = [
	"/sys/class/thermal/thermal_zone0/temp",
	"/sys/devices/virtual/thermal/thermal_zone0/temp"
];

export const DEFAULT_THROTTLE_PATHS = [
	"/sys/devices/platform/soc/soc:firmware/get_throttled",
	"/sys/devices/platform/scb/soc:firmware/get_throttled",
	"/sys/firmware/devicetree/base/soc/get_throttled"
];

export const DEFAULT_VCGENCMD_PATHS = ["/usr/bin/vcgencmd", "/opt/vc/bin/vcgencmd"];

const DEFAULT_CPUFREQ_DIR = "/sys/devices/system/cpu/cpu0/cpufreq";
const DEFAULT_THERMAL_DIR = "/sys/class/thermal/thermal_zone0";

export type CommandExecutor = (file: string, args: string[]) => Promise<string>;

async function execStdout(file: string, args: string[]): Promise<string> {
	const { stdout } = await execFileAsync(file, args, { timeout: 5000 });
	return stdout;
}

export interface CpuSensorOptions {
	tempPaths?: string[];
	throttlePaths?: string[];
	vcgencmdPaths?: string[];
	cpufreqDir?: string;
	thermalDir?: string;
	exec?: CommandExecutor;
}

async function readText(file: string): Promise<string | null> {
	try {
		return (await fs.readFile(file, "utf8")).trim();
	} catch {
		return null;
	}
}

async function readInt(file: string): Promise<number | null> {
	const raw = await readText(file);
	if (raw === null || !/^-?\d+$/.test(raw)) return null;
	return Number(raw);
}

function parseHex(raw: string): number | null {
	const s = raw.trim();
	if (!/^(0x)?[0-9a-f]+$/i.test(s)) return null;
	return parseInt(s, 16);
}

function round2(value: number): number {
	return Math.round(value * 100) / 100;
}

/**
 * CPU temperature and throttle flags on a Raspberry Pi. Each value is taken from the first
 * source that answers: sysfs, then `vcgencmd`, then (throttle only) cpufreq/thermal inference.
 */
export class PiSystemSensors implements SystemSensors {
	private readonly tempPaths: string[];
	private readonly throttlePaths: string[];
	private readonly vcgencmdPaths: string[];
	private readonly cpufreqDir: string;
	private readonly thermalDir: string;
	private readonly exec: CommandExecutor;

	constructor(opts: CpuSensorOptions = {}) {
		this.tempPaths = opts.tempPaths ?? DEFAULT_TEMP_PATHS;
		this.throttlePaths = opts.throttlePaths ?? DEFAULT_THROTTLE_PATHS;
		this.vcgencmdPaths = opts.vcgencmdPaths ?? DEFAULT_VCGENCMD_PATHS;
		this.cpufreqDir = opts.cpufreqDir ?? DEFAULT_CPUFREQ_DIR;
		this.thermalDir = opts.thermalDir ?? DEFAULT_THERMAL_DIR;
		this.exec = opts.exec ?? execStdout;
	}

	async readTemperature(): Promise<number | null> {
		for (const file of this.tempPaths) {
			const milli = await readInt(file);
			if (milli !== null) {
				// millidegrees Celsius -> Celsius
				return round2(milli / 1000);
			}
		}

		const out = await this.vcgencmd("measure_temp");
		// temp=48.3'C
		const match = out?.match(/temp=([\d.]+)/);
		if (match) {
			const value = Number(match[1]);
			if (Number.isFinite(value)) return round2(value);
		}

		return null;
	}

	async readThrottleState(): Promise<number | null> {
		for (const file of this.throttlePaths) {
			const raw = await readText(file);
			const value = raw === null ? null : parseHex(raw);
			if (value !== null) return value;
		}

		const out = await this.vcgencmd("get_throttled");
		// throttled=0x50005
		const match = out?.match(/throttled=(\S+)/);
		if (match) {
			const value = parseHex(match[1]);
			if (value !== null) return value;
		}

		return this.inferThrottleState();
	}

	/**
	 * Last resort when the firmware flags are not exported: report a frequency cap when the
	 * scaling limit sits below 95% of the hardware maximum, and a soft temperature limit once
	 * the first trip point is reached.
	 */
	async inferThrottleState(): Promise<number | null> {
		const scalingMax = await readInt(path.join(this.cpufreqDir, "scaling_max_freq"));
		const cpuinfoMax = await readInt(path.join(this.cpufreqDir, "cpuinfo_max_freq"));
		const temp = await readInt(path.join(this.thermalDir, "temp"));
		const trip = await readInt(path.join(this.thermalDir, "trip_point_0_temp"));

		if (scalingMax === null && cpuinfoMax === null && temp === null && trip === null) {
			return null;
		}

		let mask = 0;
		if (scalingMax !== null && cpuinfoMax !== null && scalingMax < Math.trunc(cpuinfoMax * 0.95)) {
			mask |= 1 << FREQ_CAPPED_BIT;
		}
		if (temp !== null && trip !== null && temp >= trip) {
			mask |= 1 << SOFT_TEMP_LIMIT_BIT;
		}
		return mask;
	}

	private async vcgencmd(arg: string): Promise<string | null> {
		for (const bin of this.vcgencmdPaths) {
			try {
				return await this.exec(bin, [arg]);
			} catch {
				continue;
			}
		}
		return null;
	}
}

const NOW_LABELS: readonly [number, string][] = [
	[UNDER_VOLTAGE_BIT, "Under-voltage NOW"],
	[FREQ_CAPPED_BIT, "Frequency capped NOW"],
	[THROTTLED_BIT, "Throttled NOW"],
	[SOFT_TEMP_LIMIT_BIT, "Soft temp limit NOW"]
];

const OCCURRED_LABELS: readonly [number, string][] = [
	[UNDER_VOLTAGE_BIT + OCCURRED_OFFSET, "Under-voltage OCCURRED"],
	[FREQ_CAPPED_BIT + OCCURRED_OFFSET, "Frequency capped OCCURRED"],
	[THROTTLED_BIT + OCCURRED_OFFSET, "Throttling OCCURRED"],
	[SOFT_TEMP_LIMIT_BIT + OCCURRED_OFFSET, "Soft temp limit OCCURRED"]
];

/** Human readable form of a throttle bitmask, "OK" when no flag is set. */
export function decodeCpuStat(mask: number): string {
	const messages = [...NOW_LABELS, ...OCCURRED_LABELS]
		.filter(([bit]) => (mask & (1 << bit)) !== 0)
		.map(([, label]) => label);

	return messages.length > 0 ? messages.join(", ") : "OK";
}
