import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { deviceTopics } from "@redreactor/common";

import { createSilentLogger } from "../lib/log";
import { FakePublisher } from "../testing/fakes";
import { DiscoveryPublisher, buildDiscoveryMessages } from "./discovery";

const topics = deviceTopics({ baseTopic: "redreactor", hostname: "garage-pi", state: "state", status: "status", set: "set" });

const base = {
	homeassistant: { discovery: true, topic: "homeassistant", discoveryInterval: 120, expireAfter: 90 },
	hostname: { name: "garage-pi", pretty: "Garage" },
	status: { online: "online", offline: "offline" },
	topics
};

describe("buildDiscoveryMessages", () => {
	const messages = buildDiscoveryMessages(base);

	function find(topic: string): Record<string, unknown> {
		const msg = messages.find(m => m.topic === topic);
		if (!msg) throw new Error(`no discovery message on ${topic}`);
		return msg.payload;
	}

	it("builds one config per entity", () => {
		expect(messages.map(m => m.topic)).toEqual([
			"homeassistant/sensor/redreactor_garage-pi_voltage/config",
			"homeassistant/sensor/redreactor_garage-pi_current/config",
			"homeassistant/sensor/redreactor_garage-pi_battery_level/config",
			"homeassistant/binary_sensor/redreactor_garage-pi_external_power/config",
			"homeassistant/sensor/redreactor_garage-pi_cpu_temperature/config",
			"homeassistant/sensor/redreactor_garage-pi_cpu_stat/config",
			"homeassistant/number/redreactor_garage-pi_battery_warning_threshold/config",
			"homeassistant/number/redreactor_garage-pi_battery_voltage_minimum/config",
			"homeassistant/number/redreactor_garage-pi_battery_voltage_maximum/config",
			"homeassistant/number/redreactor_garage-pi_report_interval/config",
			"homeassistant/button/redreactor_garage-pi_restart/config",
			"homeassistant/button/redreactor_garage-pi_shutdown/config"
		]);
	});

	it("describes a sensor with state, availability and device", () => {
		expect(find("homeassistant/sensor/redreactor_garage-pi_voltage/config")).toEqual({
			name: "Red Reactor Garage Voltage",
			unique_id: "redreactor_garage-pi_voltage",
			object_id: "redreactor_garage-pi_voltage",
			state_topic: "redreactor/garage-pi/state",
			value_template: "{{ value_json.voltage }}",
			availability: [{ topic: "redreactor/garage-pi/status", payload_available: "online", payload_not_available: "offline" }],
			availability_mode: "all",
			expire_after: 90,
			device: {
				identifiers: ["redreactor_garage-pi"],
				name: "Red Reactor Garage",
				manufacturer: "Pascal Herczog",
				model: "Red Reactor",
				hw_version: "Rev 1.5",
				sw_version: "1.0.0"
			},
			device_class: "voltage",
			unit_of_measurement: "V",
			state_class: "measurement",
			suggested_display_precision: 2
		});
	});

	it("gives numbers a command topic and limits", () => {
		expect(find("homeassistant/number/redreactor_garage-pi_report_interval/config")).toMatchObject({
			command_topic: "redreactor/garage-pi/set/report_interval",
			command_template: "{{ value }}",
			min: 5,
			max: 300,
			step: 5,
			mode: "box",
			unit_of_measurement: "s"
		});
	});

	it("gives buttons a command topic and no state", () => {
		const shutdown = find("homeassistant/button/redreactor_garage-pi_shutdown/config");
		expect(shutdown.command_topic).toBe("redreactor/garage-pi/set/shutdown");
		expect(shutdown).not.toHaveProperty("state_topic");
		expect(shutdown).not.toHaveProperty("expire_after");
	});

	it("maps the binary sensor to the ON/OFF payloads", () => {
		expect(find("homeassistant/binary_sensor/redreactor_garage-pi_external_power/config")).toMatchObject({
			payload_on: "ON",
			payload_off: "OFF",
			device_class: "plug"
		});
	});
});

describe("DiscoveryPublisher", () => {
	let publisher: FakePublisher;
	let discovery: DiscoveryPublisher;

	beforeEach(() => {
		vi.useFakeTimers();
		publisher = new FakePublisher();
		discovery = new DiscoveryPublisher({ ...base, publisher, logger: createSilentLogger() });
	});

	afterEach(() => {
		discovery.stop();
		vi.useRealTimers();
	});

	it("publishes every config retained", () => {
		expect(discovery.announce()).toBe(12);
		expect(publisher.published).toHaveLength(12);
		expect(publisher.published.every(m => m.opts.retain && m.opts.qos === 1)).toBe(true);
	});

	it("skips the announcement while disconnected", () => {
		publisher.connected = false;
		expect(discovery.announce()).toBe(0);
	});

	it("repeats on the discovery interval until stopped", async () => {
		discovery.start();
		await vi.advanceTimersByTimeAsync(240_000);
		expect(publisher.published).toHaveLength(24);

		discovery.stop();
		await vi.advanceTimersByTimeAsync(240_000);
		expect(publisher.published).toHaveLength(24);
	});
});
