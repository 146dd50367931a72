import { Command } from "commander";

import { loadConfig } from "./lib/config";
import type { AppConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./lib/log";
import type { DynamicSettings } from "./lib/snapshot";
import { initDb, loadSettings, openDb, resolveSettings } from "./lib/sqlite";
import { deriveState, evaluateShutdownPolicy } from "./monitor/derive";
import { PiSystemSensors, decodeCpuStat, openPowerSensor } from "./sensors";

import type winston from "winston";

interface ReaderOptions {
	raw: boolean;
}

function parseReaderOptions(): ReaderOptions {
	const program = new Command();

	program
		.option("--raw", "Print the sensor reading without derived values", false)
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(process.argv);
	return program.opts<ReaderOptions>();
}

// Prefer the persisted settings so the output matches what the daemon would publish.
function currentSettings(config: AppConfig, logger: winston.Logger): DynamicSettings {
	try {
		const handle = openDb(config.paths.database);
		try {
			initDb(handle.db);
			return resolveSettings(loadSettings(handle.db), config.defaults).settings;
		} finally {
			handle.close();
		}
	} catch (err) {
		logger.warn("Settings database unavailable (%s), using configured defaults", errorMessage(err));
		return config.defaults;
	}
}

async function main(): Promise<void> {
	const { raw } = parseReaderOptions();
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "sensor-reader",
		consoleLevel: "warn",
		fileLevel: config.logging.file
	});

	logger.info("Sensor reader starting (one-shot, driver=%s)", config.ina.driver);

	const sensor = await openPowerSensor(config.ina);
	try {
		const reading = await sensor.readPower();
		if (raw) {
			console.log(JSON.stringify(reading, null, 2));
			return;
		}

		const cpuSensors = new PiSystemSensors();
		const [temperature, throttleState] = await Promise.all([
			cpuSensors.readTemperature(),
			cpuSensors.readThrottleState()
		]);

		const state = deriveState(reading, { temperature, throttleState }, currentSettings(config, logger));
		const output = {
			...state,
			power: reading.power,
			cpu_stat_text: throttleState === null ? null : decodeCpuStat(throttleState),
			shutdown_required: evaluateShutdownPolicy(state) !== null
		};
		console.log(JSON.stringify(output, null, 2));
	} finally {
		await sensor.close();
	}

	logger.info("Sensor reader exiting (one-shot)");
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
