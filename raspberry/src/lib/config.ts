import "dotenv/config";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { configError } from "./errors";
import { DynamicSettingsSchema, MAX_INTERVAL_SECONDS, MAX_TIMER_MS } from "./snapshot";

export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LogLevelSchema = z.enum(LOG_LEVELS);

const topicName = z.string().min(1).regex(/^[^#+]+$/, "must not contain MQTT wildcards");

const ConfigFileSchema = z.object({
	mqtt: z.object({
		broker: z.string().min(1),
		port: z.number().int().min(1).max(65535),
		user: z.string().optional(),
		password: z.string().optional(),
		clientId: z.string().min(1),
		baseTopic: topicName,
		version: z.union([z.literal(3), z.literal(5)]),
		transport: z.enum(["tcp", "websockets"]),
		keepalive: z.number().int().positive(),
		topic: z.object({
			state: topicName,
			status: topicName,
			set: topicName
		}),
		exitOnFail: z.boolean(),
		backoff: z.object({
			initialDelayMs: z.number().int().positive().max(MAX_TIMER_MS),
			maxDelayMs: z.number().int().positive().max(MAX_TIMER_MS),
			factor: z.number().min(1),
			jitterMs: z.number().int().nonnegative()
		})
	}),
	hostname: z.object({
		name: z.string().regex(/^[A-Za-z0-9_-]+$/, "may only contain letters, digits, '-' and '_'"),
		pretty: z.string().min(1)
	}),
	homeassistant: z.object({
		discovery: z.boolean(),
		topic: topicName,
		discoveryInterval: z.number().int().positive().max(MAX_INTERVAL_SECONDS),
		expireAfter: z.number().int().nonnegative()
	}),
	status: z.object({
		online: z.string().min(1),
		offline: z.string().min(1)
	}),
	ina: z.object({
		driver: z.enum(["ina219", "simulated"]),
		busNumber: z.number().int().nonnegative(),
		address: z.number().int().min(0x40).max(0x4f),
		shuntOhms: z.number().positive(),
		maxExpectedAmps: z.number().positive(),
		monitorInterval: z.number().positive().max(MAX_INTERVAL_SECONDS)
	}),
	system: z.object({
		shutdown: z.string().min(1),
		restart: z.string().min(1),
		offlineGraceMs: z.number().int().nonnegative().max(MAX_TIMER_MS)
	}),
	logging: z.object({
		console: LogLevelSchema,
		file: LogLevelSchema
	}),
	defaults: DynamicSettingsSchema
});

export type StaticConfig = z.infer<typeof ConfigFileSchema>;
export type MqttConfig = StaticConfig["mqtt"];
export type SensorConfig = StaticConfig["ina"];

export interface AppConfig extends StaticConfig {
	paths: {
		config: string;
		database: string;
		logDir: string;
	};
}

/* ---------- defaults ---------- */

const DEFAULT_CONFIG_FILE = "config.json";
const DEFAULT_DATABASE = "/var/lib/redreactor/settings.sqlite";
const DEFAULT_LOG_DIR = "/var/log/redreactor";

function defaultHostname(): string {
	const sanitized = os.hostname().replace(/[^A-Za-z0-9_-]/g, "-");
	return sanitized || "redreactor";
}

function buildDefaults(): Record<string, unknown> {
	const hostname = defaultHostname();
	return {
		mqtt: {
			broker: "127.0.0.1",
			port: 1883,
			clientId: "Red Reactor",
			baseTopic: "redreactor",
			version: 5,
			transport: "tcp",
			keepalive: 120,
			topic: {
				state: "state",
				status: "status",
				set: "set"
			},
			exitOnFail: true,
			backoff: {
				initialDelayMs: 1000,
				maxDelayMs: 60000,
				factor: 2,
				jitterMs: 250
			}
		},
		hostname: { name: hostname, pretty: hostname },
		homeassistant: {
			discovery: true,
			topic: "homeassistant",
			discoveryInterval: 120,
			expireAfter: 120
		},
		status: { online: "online", offline: "offline" },
		ina: {
			driver: "ina219",
			busNumber: 1,
			address: 0x40,
			shuntOhms: 0.05,
			maxExpectedAmps: 5.5,
			monitorInterval: 5
		},
		system: {
			shutdown: "sudo shutdown 0 -h",
			restart: "sudo shutdown 0 -r",
			offlineGraceMs: 2000
		},
		logging: { console: "info", file: "warn" },
		defaults: {
			reportInterval: 30,
			batteryWarningThreshold: 10,
			batteryVoltageMinimum: 2.7,
			batteryVoltageMaximum: 4.2
		}
	};
}

/* ---------- command line ---------- */

export interface CliOptions {
	config: string;
	database: string;
	logDir: string;
}

export function parseCommandLine(argv: readonly string[] = process.argv): CliOptions {
	const program = new Command();

	program
		.option("-c, --config <path>", "Path to configuration file", DEFAULT_CONFIG_FILE)
		.option("-d, --database <path>", "SQLite database holding the dynamic settings", DEFAULT_DATABASE)
		.option("-l, --log-dir <dir>", "Directory for log files", DEFAULT_LOG_DIR)
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse([...argv]);

	return program.opts<CliOptions>();
}

/* ---------- merging ---------- */

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Recursively merge `override` into a copy of `base`; arrays and scalars replace. */
export function mergeDeep(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(override)) {
		const current = out[key];
		out[key] = isRecord(current) && isRecord(value) ? mergeDeep(current, value) : value;
	}
	return out;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
	const mqtt: Record<string, unknown> = {};
	const broker = env.MQTT_BROKER?.trim();
	const user = env.MQTT_USER?.trim();
	const password = env.MQTT_PASSWORD;
	if (broker) mqtt.broker = broker;
	if (user) mqtt.user = user;
	if (password) mqtt.password = password;

	const out: Record<string, unknown> = {};
	if (Object.keys(mqtt).length > 0) out.mqtt = mqtt;

	const logLevel = env.LOG_LEVEL?.trim().toLowerCase();
	if (logLevel) out.logging = { console: logLevel };
	return out;
}

/* ---------- validation ---------- */

export function parseStaticConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): StaticConfig {
	if (!isRecord(raw)) {
		throw configError("configuration file must contain a JSON object");
	}

	const merged = mergeDeep(mergeDeep(buildDefaults(), raw), envOverrides(env));
	const res = ConfigFileSchema.safeParse(merged);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid configuration: ${issues}`, res.error.issues);
	}

	return res.data;
}

/* ---------- public API ---------- */

export function loadConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): AppConfig {
	const cli = parseCommandLine(argv);

	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(cli.config, "utf8"));
	} catch (err) {
		throw configError(`Unable to read configuration file ${cli.config}: ${err instanceof Error ? err.message : String(err)}`);
	}

	const cfg = parseStaticConfig(raw, env);

	return {
		...cfg,
		paths: {
			config: path.resolve(cli.config),
			database: cli.database === ":memory:" ? cli.database : path.resolve(cli.database),
			logDir: path.resolve(cli.logDir)
		}
	};
}
