import type { Logger } from "winston";
import { commandTopic } from "@redreactor/common";
import type { DeviceTopics } from "@redreactor/common";

import type { StaticConfig } from "../lib/config";
import type { Publisher } from "../mqtt/broker";
import { ENTITIES } from "./entities";
import type { Entity } from "./entities";

export interface DiscoveryOptions {
	homeassistant: StaticConfig["homeassistant"];
	hostname: StaticConfig["hostname"];
	status: StaticConfig["status"];
	topics: DeviceTopics;
	publisher: Publisher;
	logger: Logger;
	version?: string;
}

export interface DiscoveryMessage {
	topic: string;
	payload: Record<string, unknown>;
}

/** Build the retained Home Assistant discovery config for every entity. */
export function buildDiscoveryMessages(opts: Omit<DiscoveryOptions, "publisher" | "logger">): DiscoveryMessage[] {
	const { homeassistant, hostname, status, topics } = opts;
	const identifier = `redreactor_${hostname.name}`;
	const deviceName = `Red Reactor ${hostname.pretty}`;

	const device = {
		identifiers: [identifier],
		name: deviceName,
		manufacturer: "Pascal Herczog",
		model: "Red Reactor",
		hw_version: "Rev 1.5",
		sw_version: opts.version ?? "1.0.0"
	};

	return ENTITIES.map((entity: Entity) => {
		const uniqueId = `${identifier}_${entity.field}`;
		const payload: Record<string, unknown> = {
			name: `${deviceName} ${entity.pretty}`,
			unique_id: uniqueId,
			object_id: uniqueId,
			state_topic: topics.state,
			value_template: `{{ value_json.${entity.field} }}`,
			availability: [
				{
					topic: topics.status,
					payload_available: status.online,
					payload_not_available: status.offline
				}
			],
			availability_mode: "all",
			expire_after: homeassistant.expireAfter,
			device
		};

		if (entity.deviceClass) payload.device_class = entity.deviceClass;
		if (entity.entityCategory) payload.entity_category = entity.entityCategory;
		if (entity.unit) payload.unit_of_measurement = entity.unit;

		switch (entity.component) {
			case "sensor":
				payload.state_class = "measurement";
				if (entity.precision !== undefined) payload.suggested_display_precision = entity.precision;
				break;
			case "binary_sensor":
				payload.payload_on = "ON";
				payload.payload_off = "OFF";
				break;
			case "number":
				payload.command_topic = commandTopic(topics, entity.field);
				payload.command_template = "{{ value }}";
				payload.min = entity.min;
				payload.max = entity.max;
				payload.step = entity.step;
				payload.mode = entity.mode;
				break;
			case "button":
				// buttons have no state
				delete payload.state_topic;
				delete payload.value_template;
				delete payload.expire_after;
				payload.command_topic = commandTopic(topics, entity.field);
				payload.payload_press = "true";
				break;
		}

		return {
			topic: `${homeassistant.topic}/${entity.component}/${uniqueId}/config`,
			payload
		};
	});
}

/**
 * Publishes discovery configs once per (re)connection and then every `discoveryInterval`
 * seconds so Home Assistant picks the device up again after its own restart.
 */
export class DiscoveryPublisher {
	private readonly messages: DiscoveryMessage[];
	private timer: NodeJS.Timeout | null = null;

	constructor(private readonly opts: DiscoveryOptions) {
		this.messages = buildDiscoveryMessages(opts);
	}

	get entityCount(): number {
		return this.messages.length;
	}

	/** Returns the number of configs handed to the broker. */
	announce(): number {
		const { publisher, logger } = this.opts;
		if (!publisher.connected) {
			logger.debug("Broker not connected, discovery skipped");
			return 0;
		}

		logger.debug("Publishing Home Assistant discovery for %d entities", this.messages.length);
		let sent = 0;
		for (const msg of this.messages) {
			if (publisher.publish(msg.topic, JSON.stringify(msg.payload), { qos: 1, retain: true })) {
				sent++;
			}
		}
		return sent;
	}

	start(): void {
		if (this.timer) return;
		const intervalMs = this.opts.homeassistant.discoveryInterval * 1000;
		this.timer = setInterval(() => this.announce(), intervalMs);
	}

	stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}
}
