import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { DynamicSettingsSchema } from "./snapshot";
import type { DynamicSettings } from "./snapshot";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

const SETTING_KEYS: readonly (keyof DynamicSettings)[] = [
	"batteryWarningThreshold",
	"batteryVoltageMinimum",
	"batteryVoltageMaximum",
	"reportInterval"
];

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

export function openDb(sqlitePath: string): DbHandle {
	if (sqlitePath !== ":memory:") {
		ensureDir(path.dirname(sqlitePath));
	}

	const db = new Database(sqlitePath);

	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function initDb(db: Database.Database): void {
	const tx = db.transaction(() => {
		const row = db.prepare("PRAGMA user_version").get() as { user_version: number } | undefined;
		const ver = row?.user_version ?? 0;

		if (ver === 0) {
			db.exec(`
				CREATE TABLE IF NOT EXISTS settings (
					key        TEXT PRIMARY KEY,
					value      TEXT NOT NULL,
					updatedAt  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
				);
			`);

			db.pragma("user_version = 1");
		}
	});

	tx();
}

/**
 * Read whatever settings were persisted. Unknown keys and values that are not numbers are
 * ignored, so the caller merges the result over its defaults.
 */
export function loadSettings(db: Database.Database): Partial<DynamicSettings> {
	const rows = db.prepare("SELECT key, value FROM settings").all() as { key: string; value: string }[];
	const out: Partial<DynamicSettings> = {};

	for (const row of rows) {
		const key = SETTING_KEYS.find(k => k === row.key);
		if (!key) continue;

		const value = Number(row.value);
		if (Number.isFinite(value)) {
			out[key] = value;
		}
	}

	return out;
}

export function saveSettings(db: Database.Database, settings: DynamicSettings): void {
	const stmt = db.prepare(`
		INSERT INTO settings (key, value, updatedAt)
		VALUES (@key, @value, strftime('%Y-%m-%dT%H:%M:%fZ','now'))
		ON CONFLICT(key) DO UPDATE SET value = excluded.value, updatedAt = excluded.updatedAt
	`);

	const tx = db.transaction(() => {
		for (const key of SETTING_KEYS) {
			stmt.run({ key, value: String(settings[key]) });
		}
	});

	tx();
}

/**
 * Merge persisted settings over the defaults. Falls back to the defaults when the stored
 * combination breaks an invariant (e.g. minimum above maximum after a manual edit).
 */
export function resolveSettings(
	stored: Partial<DynamicSettings>,
	defaults: DynamicSettings
): { settings: DynamicSettings; usedDefaults: boolean } {
	const merged = { ...defaults, ...stored };
	const res = DynamicSettingsSchema.safeParse(merged);
	if (res.success) {
		return { settings: res.data, usedDefaults: false };
	}
	return { settings: { ...defaults }, usedDefaults: true };
}
