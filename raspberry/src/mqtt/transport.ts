import { connect } from "mqtt";
import type { IClientOptions } from "mqtt";

import type { MqttConfig } from "../lib/config";

export type QoS = 0 | 1 | 2;

export interface PublishOptions {
	qos: QoS;
	retain: boolean;
}

export interface LastWill {
	topic: string;
	payload: string;
	qos: QoS;
	retain: boolean;
}

export interface TransportHandlers {
	onConnect(): void;
	onClose(): void;
	onError(err: Error): void;
	onMessage(topic: string, payload: Buffer): void;
}

/**
 * The small part of an MQTT client the daemon relies on. Automatic reconnects are disabled,
 * the caller decides when `reconnect()` runs.
 */
export interface MqttTransport {
	publish(topic: string, payload: string, opts: PublishOptions, done: (err?: Error) => void): void;
	subscribe(topic: string, qos: QoS, done: (err: Error | null) => void): void;
	reconnect(): void;
	end(done: () => void): void;
}

export type TransportFactory = (mqtt: MqttConfig, will: LastWill, handlers: TransportHandlers) => MqttTransport;

export function brokerUrl(mqtt: MqttConfig): string {
	const scheme = mqtt.transport === "websockets" ? "ws" : "mqtt";
	return `${scheme}://${mqtt.broker}:${mqtt.port}`;
}

export function clientOptions(mqtt: MqttConfig, will: LastWill): IClientOptions {
	return {
		clientId: mqtt.clientId,
		username: mqtt.user,
		password: mqtt.password,
		// 3 selects MQTT 3.1.1
		protocolVersion: mqtt.version === 5 ? 5 : 4,
		keepalive: mqtt.keepalive,
		clean: true,
		reconnectPeriod: 0,
		resubscribe: false,
		will: {
			topic: will.topic,
			payload: Buffer.from(will.payload),
			qos: will.qos,
			retain: will.retain
		}
	};
}

export const connectMqtt: TransportFactory = (mqtt, will, handlers) => {
	const client = connect(brokerUrl(mqtt), clientOptions(mqtt, will));

	client.on("connect", () => handlers.onConnect());
	client.on("close", () => handlers.onClose());
	client.on("error", err => handlers.onError(err));
	client.on("message", (topic: string, payload: Buffer) => handlers.onMessage(topic, payload));

	return {
		publish: (topic, payload, opts, done) => {
			client.publish(topic, payload, opts, err => done(err));
		},
		subscribe: (topic, qos, done) => {
			client.subscribe(topic, { qos }, err => done(err));
		},
		reconnect: () => {
			client.reconnect();
		},
		end: done => {
			client.end(false, {}, () => done());
		}
	};
};
