import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

import type { LogLevel } from "./config";

export interface LoggerOptions {
	logDir: string;
	serviceName: string;
	consoleLevel?: LogLevel;
	fileLevel?: LogLevel;
	console?: boolean;
	rotate?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

// Numeric rank of the more verbose of two levels, so the logger itself never filters
// out a message that one of its transports wants.
function mostVerbose(a: string, b: string): string {
	const rank = winston.config.npm.levels;
	return (rank[a] ?? 0) >= (rank[b] ?? 0) ? a : b;
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const consoleLevel = getLevel(opts.consoleLevel);
	const fileLevel = getLevel(opts.fileLevel ?? opts.consoleLevel);

	const baseFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = info.timestamp as string;
			const svc = opts.serviceName;
			const meta = info.stack ? `\n${info.stack}` : "";
			return `${ts} [${svc}] ${info.level}: ${info.message}${meta}`;
		})
	);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level: consoleLevel,
				format: baseFormat
			})
		);
	}

	ensureDir(opts.logDir);

	if (opts.rotate ?? true) {
		transports.push(
			new DailyRotateFile({
				level: fileLevel,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	} else {
		transports.push(
			new winston.transports.File({
				level: fileLevel,
				filename: path.join(opts.logDir, `${opts.serviceName}.log`),
				format: baseFormat
			})
		);
		transports.push(
			new winston.transports.File({
				level: "error",
				filename: path.join(opts.logDir, `${opts.serviceName}.error.log`),
				format: baseFormat
			})
		);
	}

	return winston.createLogger({
		level: mostVerbose(consoleLevel, fileLevel),
		format: baseFormat,
		transports
	});
}

/** Logger that discards everything; used by tests and one-shot tools that print to stdout. */
export function createSilentLogger(): winston.Logger {
	return winston.createLogger({
		silent: true,
		transports: [new winston.transports.Console({ silent: true })]
	});
}
