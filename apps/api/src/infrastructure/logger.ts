import winston from 'winston';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const devFormat = printf(({ level, message, timestamp: time, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${time} ${level}: ${message}${extra}`;
});

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT === 'true',
    format: combine(errors({ stack: true }), timestamp(), json()),
    transports: [
        new winston.transports.Console(
            process.env.NODE_ENV === 'production'
                ? {}
                : { format: combine(errors({ stack: true }), timestamp(), colorize(), devFormat) }
        ),
    ],
});

export default logger;
