export type LogMeta = Record<string, unknown>;

export interface GraphLogger {
	debug(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
}

export const noopLogger: GraphLogger = Object.freeze({
	debug: () => undefined,
	warn: () => undefined
});
