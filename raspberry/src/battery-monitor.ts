import type winston from "winston";
import { deviceTopics } from "@redreactor/common";

import { CommandHandler } from "./commands/handler";
import { DiscoveryPublisher } from "./homeassistant/discovery";
import { Channel } from "./lib/channel";
import { loadConfig } from "./lib/config";
import type { AppConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./lib/log";
import { SettingsSnapshot } from "./lib/snapshot";
import type { DynamicSettings } from "./lib/snapshot";
import { initDb, loadSettings, openDb, resolveSettings, saveSettings } from "./lib/sqlite";
import type { DbHandle } from "./lib/sqlite";
import { BrokerConnection } from "./mqtt/broker";
import type { CommandMessage } from "./mqtt/broker";
import { MonitorLoop } from "./monitor/monitor";
import { PiSystemSensors, openPowerSensor } from "./sensors";
import { SystemController } from "./system/actions";

function restoreSettings(handle: DbHandle, config: AppConfig, logger: winston.Logger): DynamicSettings {
	const stored = loadSettings(handle.db);
	const { settings, usedDefaults } = resolveSettings(stored, config.defaults);

	if (usedDefaults) {
		logger.warn("Stored settings in %s are inconsistent, using configured defaults", config.paths.database);
		saveSettings(handle.db, settings);
	} else if (Object.keys(stored).length === 0) {
		saveSettings(handle.db, settings);
	}

	logger.info(
		"Settings: threshold=%d%% min=%dV max=%dV interval=%ds",
		settings.batteryWarningThreshold,
		settings.batteryVoltageMinimum,
		settings.batteryVoltageMaximum,
		settings.reportInterval
	);
	return settings;
}

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "battery-monitor",
		consoleLevel: config.logging.console,
		fileLevel: config.logging.file
	});

	process.on("unhandledRejection", reason => {
		logger.error("Unhandled rejection: %s", errorMessage(reason));
	});

	logger.info("Battery monitor starting (host=%s, config=%s)", config.hostname.name, config.paths.config);

	const handle = openDb(config.paths.database);
	initDb(handle.db);

	const settings = new SettingsSnapshot(restoreSettings(handle, config, logger));
	settings.onChange(next => {
		try {
			saveSettings(handle.db, next);
		} catch (err) {
			logger.error("Unable to persist settings: %s", errorMessage(err));
		}
	});

	const topics = deviceTopics({
		baseTopic: config.mqtt.baseTopic,
		hostname: config.hostname.name,
		...config.mqtt.topic
	});

	const sensor = await openPowerSensor(config.ina);
	logger.info("Power sensor '%s' ready (bus=%d, address=0x%s)", sensor.type, config.ina.busNumber, config.ina.address.toString(16));

	const broker = new BrokerConnection({
		mqtt: config.mqtt,
		status: config.status,
		topics,
		logger,
		offlineGraceMs: config.system.offlineGraceMs
	});

	const controller = new SystemController({
		system: config.system,
		status: config.status,
		topics,
		publisher: broker,
		logger
	});

	const monitor = new MonitorLoop({
		sensor,
		systemSensors: new PiSystemSensors(),
		settings,
		publisher: broker,
		topics,
		controller,
		logger,
		monitorInterval: config.ina.monitorInterval
	});
	controller.onAction(() => monitor.halt());
	controller.onAbort(() => monitor.resume());

	const channel = new Channel<CommandMessage>();
	broker.onMessage(msg => {
		if (!channel.push(msg)) {
			logger.debug("Command channel closed, dropping '%s'", msg.command);
		}
	});
	const commands = new CommandHandler(settings, controller, logger).run(channel);

	let discovery: DiscoveryPublisher | null = null;
	if (config.homeassistant.discovery) {
		const publisher = new DiscoveryPublisher({
			homeassistant: config.homeassistant,
			hostname: config.hostname,
			status: config.status,
			topics,
			publisher: broker,
			logger
		});
		broker.onConnected(() => publisher.announce());
		publisher.start();
		discovery = publisher;
		logger.info("Home Assistant discovery enabled (%d entities)", publisher.entityCount);
	}

	try {
		await new Promise<void>((resolve, reject) => {
			const stop = (signal: NodeJS.Signals) => {
				logger.info("Stopping battery monitor (signal=%s)", signal);
				resolve();
			};
			process.once("SIGINT", stop);
			process.once("SIGTERM", stop);
			broker.onFatal(reject);

			broker.start();
			monitor.start();
		});
	} finally {
		await monitor.stop();
		discovery?.stop();
		channel.close();
		await commands;
		await broker.stop();
		await sensor.close();
		handle.close();
		logger.info("Battery monitor exiting");
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
