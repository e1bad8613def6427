import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

const devFormat = combine(
	colorize(),
	timestamp(),
	printf(({ timestamp: at, level, message, module, ...meta }) => {
		const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
		return `[${at}] ${level} ${module}: ${message}${rest}`;
	})
);

/** One console transport for the process; modules log through children tagged with their name. */
const root = winston.createLogger({
	level: process.env.LOG_LEVEL || 'info',
	format: process.env.NODE_ENV === 'production' ? combine(timestamp(), json()) : devFormat,
	transports: [new winston.transports.Console()]
});

export function createLogger(moduleName: string) {
	return root.child({ module: moduleName });
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
