export const settings = {
	engine: {
		defaultSource: "journalctl",
	},
	journal: {
		executable: "journalctl",
		defaultWindowHours: 24,
		terminateTimeoutMs: 5000,
		maxStderrBytes: 64 * 1024,
	},
	file: {
		defaultEncoding: "utf8",
	},
	filter: {
		searchRawFields: false,
	},
	view: {
		maxBuffer: 10000,
		initialLimit: 1000,
		messagePreviewLength: 80,
	},
	server: {
		port: Number(process.env.PORT ?? 3000),
		host: process.env.HOST ?? "127.0.0.1",
		defaultLimit: 1000,
	},
	logging: {
		level: process.env.LOG_LEVEL ?? "info",
	},
} as const;
