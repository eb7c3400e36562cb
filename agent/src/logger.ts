export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

interface LoggerSettings {
	level: LogLevel;
	/** Route every level to stderr (stdout carries the host line protocol) */
	stderr: boolean;
}

const settings: LoggerSettings = {
	level: "debug",
	stderr: false,
};

function format(
	level: LogLevel,
	component: string,
	message: string,
	data?: unknown,
): string {
	const base = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${component}] ${message}`;
	if (data === undefined) return base;
	let json: string;
	try {
		json = JSON.stringify(data);
	} catch {
		json = String(data);
	}
	return `${base} ${json}`;
}

function emit(
	level: LogLevel,
	component: string,
	message: string,
	data?: unknown,
): void {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;
	const line = format(level, component, message, data);
	if (settings.stderr) {
		console.error(line);
		return;
	}
	switch (level) {
		case "debug":
			console.debug(line);
			break;
		case "info":
			console.info(line);
			break;
		case "warn":
			console.warn(line);
			break;
		case "error":
			console.error(line);
			break;
	}
}

export const Logger = {
	configure(options: Partial<LoggerSettings>): void {
		if (options.level) settings.level = options.level;
		if (options.stderr !== undefined) settings.stderr = options.stderr;
	},
	reset(): void {
		settings.level = "debug";
		settings.stderr = false;
	},
	debug(component: string, message: string, data?: unknown): void {
		emit("debug", component, message, data);
	},
	info(component: string, message: string, data?: unknown): void {
		emit("info", component, message, data);
	},
	warn(component: string, message: string, data?: unknown): void {
		emit("warn", component, message, data);
	},
	error(component: string, message: string, data?: unknown): void {
		emit("error", component, message, data);
	},
};

/** Logger handed to library classes; bound to one component name */
export interface NodeLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
}

export function createLogger(component: string): NodeLogger {
	return {
		debug: (message, data) => Logger.debug(component, message, data),
		info: (message, data) => Logger.info(component, message, data),
		warn: (message, data) => Logger.warn(component, message, data),
		error: (message, data) => Logger.error(component, message, data),
	};
}

export const nullLogger: NodeLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
