// State payload contract (published by the daemon, read by Home Assistant and other consumers)
export { StatePayloadSchema, ExternalPowerSchema, IntegerPayloadSchema, FloatPayloadSchema } from "./schema";
export type { StatePayload, ExternalPower } from "./schema";

// Command topics
export { SETTING_COMMANDS, ACTION_COMMANDS, isSettingCommand, isActionCommand } from "./commands";
export type { Command, SettingCommand, ActionCommand } from "./commands";

export { deviceTopics, commandTopic, commandFromTopic } from "./topics";
export type { DeviceTopics, TopicLayout } from "./topics";
