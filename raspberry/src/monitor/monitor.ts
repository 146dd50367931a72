import type { Logger } from "winston";
import type { DeviceTopics, ExternalPower, StatePayload } from "@redreactor/common";

import { asDaemonError, errorMessage } from "../lib/errors";
import type { SettingsSnapshot } from "../lib/snapshot";
import type { Publisher } from "../mqtt/broker";
import type { PowerSensor, SensorReading, SystemSensors } from "../sensors/types";
import { deriveState, evaluateShutdownPolicy, inWarningZone } from "./derive";
import type { CpuInfo } from "./derive";

export type MonitorState = "idle" | "polling" | "publishing" | "shutting_down" | "stopped";

export interface ShutdownRequester {
	shutdown(reason: string): Promise<boolean>;
}

export interface MonitorOptions {
	sensor: PowerSensor;
	systemSensors: SystemSensors;
	settings: SettingsSnapshot;
	publisher: Publisher;
	topics: DeviceTopics;
	controller: ShutdownRequester;
	logger: Logger;
	/** Seconds between sensor samples; a state report is published every report interval. */
	monitorInterval: number;
	/** How long stop() waits for a tick that is still reading the sensor. */
	stopTimeoutMs?: number;
	now?: () => number;
}

const DEFAULT_STOP_TIMEOUT_MS = 5000;

/**
 * Samples the sensor every monitor interval, publishes the derived state once per report
 * interval and powers the system off when the battery runs low without external power.
 *
 * A sample that sees external power come or go, or the battery enter the warning zone, is
 * published straight away. Ticks are scheduled from the start of the previous one so slow
 * reads do not drift the cadence, and never overlap.
 */
export class MonitorLoop {
	private _state: MonitorState = "idle";
	private timer: NodeJS.Timeout | null = null;
	private inFlight: Promise<void> | null = null;
	private lastStart = 0;
	private lastReport: number | null = null;
	private started = false;
	private stopping: Promise<void> | null = null;
	private unsubscribe: (() => void) | null = null;

	private lastExternalPower: ExternalPower | null = null;
	private warned = false;

	private readonly now: () => number;

	constructor(private readonly opts: MonitorOptions) {
		this.now = opts.now ?? Date.now;
	}

	get state(): MonitorState {
		return this._state;
	}

	start(): void {
		if (this.started) return;
		this.started = true;

		this.unsubscribe = this.opts.settings.onChange((next, previous) => {
			if (next.reportInterval !== previous.reportInterval) {
				this.opts.logger.info("Report interval changed from %ds to %ds", previous.reportInterval, next.reportInterval);
				this.rearm();
			}
		});

		this.runTick();
	}

	/** Stop scheduling ticks because a system action is under way. */
	halt(): void {
		this.clearTimer();
		if (this._state !== "stopped") {
			this.setState("shutting_down");
		}
	}

	/** Pick up polling again after a system action failed and the host keeps running. */
	resume(): void {
		if (this._state !== "shutting_down") return;
		this.opts.logger.info("Monitoring resumed");
		this.opts.logger.debug("Monitor shutting_down -> idle");
		this._state = "idle";
		this.scheduleNext();
	}

	/** Cancel the pending tick and wait, for a bounded time, for one that is running. */
	stop(): Promise<void> {
		if (!this.stopping) {
			this.clearTimer();
			this.unsubscribe?.();
			this.unsubscribe = null;
			this.setState("stopped");
			this.stopping = this.drain();
		}
		return this.stopping;
	}

	private async drain(): Promise<void> {
		const running = this.inFlight;
		if (!running) return;

		const timeoutMs = this.opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
		let timer: NodeJS.Timeout | undefined;
		const expired = new Promise<boolean>(resolve => {
			timer = setTimeout(() => resolve(true), timeoutMs);
		});
		const timedOut = await Promise.race([running.then(() => false), expired]);
		clearTimeout(timer);

		if (timedOut) {
			this.opts.logger.warn("Sensor read still running after %dms, stopping without it", timeoutMs);
		}
	}

	/**
	 * One sample/derive/publish cycle. Returns the derived state, or null when the sensor
	 * could not be read.
	 */
	async tick(): Promise<StatePayload | null> {
		const { logger, publisher, topics } = this.opts;

		const startedAt = this.now();
		this.lastStart = startedAt;
		const settings = this.opts.settings.get();

		const reportDue = this.lastReport === null || startedAt - this.lastReport >= settings.reportInterval * 1000;
		if (reportDue) {
			this.lastReport = startedAt;
		}

		this.setState("polling");
		let reading: SensorReading;
		try {
			reading = await this.opts.sensor.readPower();
		} catch (err) {
			const e = asDaemonError(err);
			logger.error("[%s] Sensor read failed, skipping this report: %s", e.code, e.message);
			this.settle();
			return null;
		}

		const cpu = await this.readCpu();
		const state = deriveState(reading, cpu, settings);
		const changed = this.logTransitions(state);

		const reason = evaluateShutdownPolicy(state);

		if (reportDue || changed || reason) {
			this.setState("publishing");
			if (publisher.connected) {
				publisher.publish(topics.state, JSON.stringify(state), { qos: 1, retain: false });
			} else {
				logger.debug("Broker not connected, state not published");
			}
		}

		if (reason) {
			this.clearTimer();
			this.setState("shutting_down");
			const detail =
				reason === "voltage"
					? `battery voltage ${state.voltage}V at or below minimum ${state.battery_voltage_minimum}V`
					: `battery level ${state.battery_level}% at or below threshold ${state.battery_warning_threshold}%`;
			await this.opts.controller.shutdown(`${detail} without external power`);
			return state;
		}

		this.settle();
		return state;
	}

	private runTick(): void {
		this.timer = null;
		if (this.isFinished()) return;

		this.inFlight = this.tick()
			.then(() => undefined)
			.catch(err => {
				this.opts.logger.error("Monitor tick failed: %s", errorMessage(err));
			})
			.finally(() => {
				this.inFlight = null;
				this.scheduleNext();
			});
	}

	private scheduleNext(): void {
		if (this.isFinished() || this.inFlight) return;

		this.clearTimer();
		const reportMs = this.opts.settings.get().reportInterval * 1000;
		const nextSample = this.lastStart + this.opts.monitorInterval * 1000;
		const nextReport = (this.lastReport ?? this.lastStart) + reportMs;
		const delay = Math.max(0, Math.min(nextSample, nextReport) - this.now());
		this.timer = setTimeout(() => this.runTick(), delay);
	}

	// A tick in flight schedules its successor with the new interval when it settles.
	private rearm(): void {
		if (this.timer) {
			this.scheduleNext();
		}
	}

	private async readCpu(): Promise<CpuInfo> {
		const { systemSensors, logger } = this.opts;
		const [temperature, throttleState] = await Promise.all([
			systemSensors.readTemperature().catch(err => {
				logger.debug("CPU temperature unavailable: %s", errorMessage(err));
				return null;
			}),
			systemSensors.readThrottleState().catch(err => {
				logger.debug("CPU throttle state unavailable: %s", errorMessage(err));
				return null;
			})
		]);
		return { temperature, throttleState };
	}

	// True when the sample is worth publishing outside the report cadence.
	private logTransitions(state: StatePayload): boolean {
		const { logger } = this.opts;
		let changed = false;

		if (this.lastExternalPower !== null && this.lastExternalPower !== state.external_power) {
			logger.info("External power %s -> %s", this.lastExternalPower, state.external_power);
			changed = true;
		}
		this.lastExternalPower = state.external_power;

		if (inWarningZone(state)) {
			if (!this.warned) {
				logger.warn(
					"Battery level %d%% at or below warning threshold %d%% (external power %s)",
					state.battery_level,
					state.battery_warning_threshold,
					state.external_power
				);
				this.warned = true;
				changed = true;
			}
		} else {
			this.warned = false;
		}
		return changed;
	}

	private settle(): void {
		if (!this.isFinished()) {
			this.setState("idle");
		}
	}

	private isFinished(): boolean {
		return this._state === "shutting_down" || this._state === "stopped";
	}

	private clearTimer(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	private setState(next: MonitorState): void {
		if (next === this._state) return;
		// terminal states are only ever left for "stopped"
		if (this._state === "stopped" || (this._state === "shutting_down" && next !== "stopped")) return;
		this.opts.logger.debug("Monitor %s -> %s", this._state, next);
		this._state = next;
	}
}
