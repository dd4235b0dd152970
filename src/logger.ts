export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

type Level = Exclude<LogLevel, 'silent'>;

/**
 * Console logging for the extractor.
 * Messages read `[component] action` followed by their metadata.
 */
export class Logger {
	private readonly threshold: number;

	constructor(readonly level: LogLevel = 'info') {
		this.threshold = LOG_LEVELS.indexOf(level);
	}

	error(component: string, action: string, metadata?: Record<string, unknown>) {
		this.log('error', component, action, metadata);
	}

	warn(component: string, action: string, metadata?: Record<string, unknown>) {
		this.log('warn', component, action, metadata);
	}

	info(component: string, action: string, metadata?: Record<string, unknown>) {
		this.log('info', component, action, metadata);
	}

	debug(component: string, action: string, metadata?: Record<string, unknown>) {
		this.log('debug', component, action, metadata);
	}

	enabled(level: Level) {
		return LOG_LEVELS.indexOf(level) <= this.threshold;
	}

	private log(level: Level, component: string, action: string, metadata?: Record<string, unknown>) {
		if (!this.enabled(level))
			return;

		const message	= `[${component}] ${action}`;
		const args		= metadata ? [message, metadata] : [message];
		switch (level) {
			case 'error':	console.error(...args); break;
			case 'warn':	console.warn(...args); break;
			case 'info':	console.log(...args); break;
			case 'debug':	console.debug(...args); break;
		}
	}
}
