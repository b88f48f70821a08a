/**
 * Sink for the engine's diagnostic output. The engine never writes to the
 * console itself; the host decides how lines are rendered.
 */
export interface ILogger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export const noopLogger: ILogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
