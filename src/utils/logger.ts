import { createLogger, format, transports } from 'winston';

const logger = createLogger({
    level: process.env.NODE_ENV === 'test' ? 'silent' : process.env.LOG_LEVEL || 'info',
    format: format.combine(format.timestamp(), format.json()),
    defaultMeta: { service: 'security-audio-briefing' },
    transports: [new transports.Console()],
});

if (process.env.NODE_ENV === 'test') {
    logger.transports.forEach((t) => (t.silent = true));
}

export { logger };
