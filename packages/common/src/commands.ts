/**
 * Commands accepted on `<base>/<host>/<set>/<command>`.
 * Settings carry a numeric payload; actions ignore theirs.
 */
export const SETTING_COMMANDS = [
	"battery_warning_threshold",
	"battery_voltage_minimum",
	"battery_voltage_maximum",
	"report_interval"
] as const;

export const ACTION_COMMANDS = ["restart", "shutdown"] as const;

export type SettingCommand = (typeof SETTING_COMMANDS)[number];
export type ActionCommand = (typeof ACTION_COMMANDS)[number];
export type Command = SettingCommand | ActionCommand;

const settingSet: ReadonlySet<string> = new Set(SETTING_COMMANDS);
const actionSet: ReadonlySet<string> = new Set(ACTION_COMMANDS);

export function isSettingCommand(name: string): name is SettingCommand {
	return settingSet.has(name);
}

export function isActionCommand(name: string): name is ActionCommand {
	return actionSet.has(name);
}
