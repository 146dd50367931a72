import type { Logger } from "winston";
import { commandFromTopic } from "@redreactor/common";
import type { DeviceTopics } from "@redreactor/common";

import { BackoffPolicy } from "../lib/backoff";
import type { MqttConfig, StaticConfig } from "../lib/config";
import { brokerError, errorMessage } from "../lib/errors";
import type { DaemonError } from "../lib/errors";
import { connectMqtt } from "./transport";
import type { MqttTransport, PublishOptions, TransportFactory } from "./transport";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting";

export interface CommandMessage {
	command: string;
	payload: string;
}

export interface Publisher {
	readonly connected: boolean;
	publish(topic: string, payload: string, opts: PublishOptions): boolean;
	publishAndWait(topic: string, payload: string, opts: PublishOptions, timeoutMs: number): Promise<boolean>;
}

export interface BrokerOptions {
	mqtt: MqttConfig;
	status: StaticConfig["status"];
	topics: DeviceTopics;
	logger: Logger;
	transportFactory?: TransportFactory;
	backoff?: BackoffPolicy;
	offlineGraceMs?: number;
}

const RETAINED: PublishOptions = { qos: 1, retain: true };

/**
 * Owns the broker session: last will, one command subscription per connection, the retained
 * online/offline status, and reconnects with exponential backoff.
 */
export class BrokerConnection implements Publisher {
	private transport: MqttTransport | null = null;
	private _state: ConnectionState = "disconnected";
	private everConnected = false;
	private stopping = false;
	private reconnectTimer: NodeJS.Timeout | null = null;

	private readonly backoff: BackoffPolicy;
	private readonly transportFactory: TransportFactory;
	private readonly connectedListeners = new Set<() => void>();
	private readonly messageListeners = new Set<(msg: CommandMessage) => void>();
	private readonly fatalListeners = new Set<(err: DaemonError) => void>();

	constructor(private readonly opts: BrokerOptions) {
		this.transportFactory = opts.transportFactory ?? connectMqtt;
		this.backoff = opts.backoff ?? new BackoffPolicy(opts.mqtt.backoff);
	}

	get state(): ConnectionState {
		return this._state;
	}

	get connected(): boolean {
		return this._state === "connected";
	}

	onConnected(listener: () => void): void {
		this.connectedListeners.add(listener);
	}

	onMessage(listener: (msg: CommandMessage) => void): void {
		this.messageListeners.add(listener);
	}

	/** Called when the broker cannot be reached at startup and `exitOnFail` is set. */
	onFatal(listener: (err: DaemonError) => void): void {
		this.fatalListeners.add(listener);
	}

	start(): void {
		if (this.transport) return;

		const { mqtt, topics, status, logger } = this.opts;
		this.setState("connecting");
		logger.info("Connecting to MQTT broker %s:%d as '%s'", mqtt.broker, mqtt.port, mqtt.clientId);

		this.transport = this.transportFactory(
			mqtt,
			{ topic: topics.status, payload: status.offline, qos: 1, retain: true },
			{
				onConnect: () => this.handleConnect(),
				onClose: () => this.handleClose(),
				onError: err => logger.error("MQTT error: %s", err.message),
				onMessage: (topic, payload) => this.handleMessage(topic, payload)
			}
		);
	}

	publish(topic: string, payload: string, opts: PublishOptions): boolean {
		const transport = this.transport;
		if (!transport || !this.connected) {
			this.opts.logger.debug("Not connected, dropping message for %s", topic);
			return false;
		}

		transport.publish(topic, payload, opts, err => {
			if (err) {
				this.opts.logger.error("Publish to %s failed: %s", topic, err.message);
			}
		});
		return true;
	}

	/** Resolves true once the broker acknowledged the message, false on error or timeout. */
	publishAndWait(topic: string, payload: string, opts: PublishOptions, timeoutMs: number): Promise<boolean> {
		const transport = this.transport;
		if (!transport || !this.connected) {
			return Promise.resolve(false);
		}

		return new Promise(resolve => {
			const timer = setTimeout(() => {
				this.opts.logger.warn("No acknowledgement for %s within %dms", topic, timeoutMs);
				resolve(false);
			}, timeoutMs);

			transport.publish(topic, payload, opts, err => {
				clearTimeout(timer);
				if (err) {
					this.opts.logger.error("Publish to %s failed: %s", topic, err.message);
				}
				resolve(!err);
			});
		});
	}

	/** Publish `offline`, then close the session. Safe to call more than once. */
	async stop(): Promise<void> {
		if (this.stopping) return;
		this.stopping = true;
		this.clearReconnect();

		const transport = this.transport;
		if (!transport) {
			this.setState("disconnected");
			return;
		}

		if (this.connected) {
			await this.publishAndWait(this.opts.topics.status, this.opts.status.offline, RETAINED, this.opts.offlineGraceMs ?? 2000);
		}

		await new Promise<void>(resolve => transport.end(resolve));
		this.setState("disconnected");
		this.opts.logger.info("MQTT session closed");
	}

	private handleConnect(): void {
		const transport = this.transport;
		if (!transport) return;

		const { topics, status, logger } = this.opts;
		this.clearReconnect();
		this.backoff.reset();
		this.everConnected = true;
		this.setState("connected");

		transport.subscribe(topics.commandWildcard, 1, err => {
			if (err) {
				logger.error("Subscribe to %s failed: %s", topics.commandWildcard, err.message);
			} else {
				logger.debug("Subscribed to %s", topics.commandWildcard);
			}
		});

		this.publish(topics.status, status.online, RETAINED);

		for (const listener of this.connectedListeners) {
			try {
				listener();
			} catch (err) {
				logger.error("Connected listener failed: %s", errorMessage(err));
			}
		}
	}

	private handleClose(): void {
		const { mqtt, logger } = this.opts;

		if (this.stopping) {
			this.setState("disconnected");
			return;
		}
		// mqtt.js may report the same drop more than once
		if (this.reconnectTimer) return;

		if (!this.everConnected && mqtt.exitOnFail) {
			this.setState("disconnected");
			const err = brokerError(`Unable to connect to MQTT broker ${mqtt.broker}:${mqtt.port}`);
			for (const listener of this.fatalListeners) {
				listener(err);
			}
			return;
		}

		this.setState("reconnecting");
		const delay = this.backoff.nextDelay();
		logger.warn("MQTT connection lost, reconnect attempt %d in %dms", this.backoff.attempts, delay);

		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			if (this.stopping || !this.transport) return;
			logger.debug("Reconnecting to MQTT broker");
			this.transport.reconnect();
		}, delay);
	}

	private handleMessage(topic: string, payload: Buffer): void {
		const command = commandFromTopic(this.opts.topics, topic);
		if (command === null) {
			this.opts.logger.debug("Ignoring message on %s", topic);
			return;
		}

		const msg: CommandMessage = { command, payload: payload.toString("utf8") };
		for (const listener of this.messageListeners) {
			listener(msg);
		}
	}

	private clearReconnect(): void {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
	}

	private setState(next: ConnectionState): void {
		if (next === this._state) return;
		this.opts.logger.debug("MQTT connection %s -> %s", this._state, next);
		this._state = next;
	}
}
