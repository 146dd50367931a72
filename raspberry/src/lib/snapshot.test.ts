import { describe, expect, it, vi } from "vitest";

import { DaemonError } from "./errors";
import { SettingsSnapshot } from "./snapshot";

const initial = {
	batteryWarningThreshold: 10,
	batteryVoltageMinimum: 2.7,
	batteryVoltageMaximum: 4.2,
	reportInterval: 30
};

describe("SettingsSnapshot", () => {
	it("hands out frozen copies", () => {
		const snapshot = new SettingsSnapshot(initial);
		const s = snapshot.get();
		expect(Object.isFrozen(s)).toBe(true);
		expect(s).toEqual(initial);
	});

	it("replaces the record and notifies listeners with both versions", () => {
		const snapshot = new SettingsSnapshot(initial);
		const listener = vi.fn();
		snapshot.onChange(listener);

		const before = snapshot.get();
		const after = snapshot.update({ batteryWarningThreshold: 25 });

		expect(after.batteryWarningThreshold).toBe(25);
		expect(before.batteryWarningThreshold).toBe(10);
		expect(listener).toHaveBeenCalledWith(after, before);
	});

	it("rejects a minimum at or above the maximum and keeps the old record", () => {
		const snapshot = new SettingsSnapshot(initial);
		const listener = vi.fn();
		snapshot.onChange(listener);

		let caught: unknown;
		try {
			snapshot.update({ batteryVoltageMinimum: 4.2 });
		} catch (err) {
			caught = err;
		}

		expect(caught).toBeInstanceOf(DaemonError);
		expect(caught instanceof DaemonError && caught.code).toBe("COMMAND_REJECTED");
		expect(snapshot.get()).toEqual(initial);
		expect(listener).not.toHaveBeenCalled();
	});

	it("rejects a non-positive report interval", () => {
		const snapshot = new SettingsSnapshot(initial);
		expect(() => snapshot.update({ reportInterval: 0 })).toThrow(DaemonError);
		expect(snapshot.get().reportInterval).toBe(30);
	});

	it("stops notifying after unsubscribe", () => {
		const snapshot = new SettingsSnapshot(initial);
		const listener = vi.fn();
		const unsubscribe = snapshot.onChange(listener);
		unsubscribe();
		snapshot.update({ reportInterval: 60 });
		expect(listener).not.toHaveBeenCalled();
	});
});
