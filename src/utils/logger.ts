import { settings } from "../config/settings";

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

function isLevel(value: string): value is Level {
	return Object.hasOwn(LEVEL_ORDER, value);
}

function minimumLevel(): number {
	const configured = settings.logging.level;
	return isLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function enabled(level: Level): boolean {
	return LEVEL_ORDER[level] >= minimumLevel();
}

export const logger = {
	debug: (msg: string, meta?: object) => {
		if (!enabled("debug")) return;
		console.log(
			JSON.stringify({
				level: "debug",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	info: (msg: string, meta?: object) => {
		if (!enabled("info")) return;
		console.log(
			JSON.stringify({
				level: "info",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	warn: (msg: string, meta?: object) => {
		if (!enabled("warn")) return;
		console.warn(
			JSON.stringify({
				level: "warn",
				message: msg,
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
	error: (msg: string, error?: unknown, meta?: object) => {
		if (!enabled("error")) return;
		console.error(
			JSON.stringify({
				level: "error",
				message: msg,
				error: error instanceof Error ? error.message : String(error),
				...meta,
				timestamp: Date.now(),
			}),
		);
	},
};
