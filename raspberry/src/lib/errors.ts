export type ErrorCode =
	| "CONFIG_ERROR"
	| "SENSOR_ERROR"
	| "SENSOR_RANGE_ERROR"
	| "COMMAND_REJECTED"
	| "BROKER_ERROR"
	| "SYSTEM_ACTION_ERROR"
	| "INTERNAL_ERROR";

export class DaemonError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "DaemonError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function asDaemonError(err: unknown): DaemonError {
	if (err instanceof DaemonError) {
		return err;
	}

	if (err instanceof Error) {
		return new DaemonError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new DaemonError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function configError(message: string, details?: unknown): DaemonError {
	return new DaemonError({ code: "CONFIG_ERROR", message, details });
}

export function sensorError(message: string, cause?: unknown): DaemonError {
	return new DaemonError({ code: "SENSOR_ERROR", message, cause });
}

export function sensorRangeError(message: string, details?: unknown): DaemonError {
	return new DaemonError({ code: "SENSOR_RANGE_ERROR", message, details });
}

export function commandRejected(message: string, details?: unknown): DaemonError {
	return new DaemonError({ code: "COMMAND_REJECTED", message, details });
}

export function brokerError(message: string, cause?: unknown): DaemonError {
	return new DaemonError({ code: "BROKER_ERROR", message, cause });
}

export function systemActionError(message: string, cause?: unknown): DaemonError {
	return new DaemonError({ code: "SYSTEM_ACTION_ERROR", message, cause });
}
