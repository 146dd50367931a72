import { z } from "zod";

export const ExternalPowerSchema = z.enum(["ON", "OFF"]);

/**
 * State payload published on `<base>/<host>/state` once per report interval.
 * Field names are the wire names consumed by Home Assistant value templates.
 */
export const StatePayloadSchema = z.object({
	voltage: z.number(),
	current: z.number(),
	battery_level: z.number().int().min(0).max(100),
	external_power: ExternalPowerSchema,
	cpu_temperature: z.number().nullable(),
	cpu_stat: z.number().int().nonnegative().nullable(),
	battery_warning_threshold: z.number().int().min(0).max(100),
	battery_voltage_minimum: z.number(),
	battery_voltage_maximum: z.number(),
	report_interval: z.number().int().positive()
});

export type StatePayload = z.infer<typeof StatePayloadSchema>;
export type ExternalPower = z.infer<typeof ExternalPowerSchema>;

// Command payloads arrive as text ("15", "3.3", "\"15\"").
const numericText = z
	.string()
	.transform(s => s.trim().replace(/^"(.*)"$/, "$1").trim())
	.refine(s => s.length > 0, { message: "payload is empty" })
	.transform(s => Number(s))
	.pipe(z.number({ invalid_type_error: "payload is not a number" }).finite("payload is not a number"));

export const IntegerPayloadSchema = numericText.pipe(z.number().int("payload is not an integer"));
export const FloatPayloadSchema = numericText;
