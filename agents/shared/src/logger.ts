import * as winston from 'winston';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
    service: string;
    level?: string;
    environment?: 'development' | 'production' | 'test';
    silent?: boolean;
}

function createWinstonLogger(options: LoggerOptions): winston.Logger {
    const level = options.level || (options.environment === 'production' ? 'info' : 'debug');

    const formats = [
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
    ];

    const transports: winston.transport[] = [];

    if (options.environment !== 'production') {
        transports.push(new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf(({ level, message, timestamp, service, component, environment, ...metadata }) => {
                    const scope = component ? `${service}:${component}` : service;
                    let msg = `${timestamp} [${scope}] ${level}: ${message}`;
                    if (Object.keys(metadata).length > 0) {
                        msg += ` ${JSON.stringify(metadata)}`;
                    }
                    return msg;
                })
            )
        }));
    } else {
        transports.push(new winston.transports.Console());
    }

    return winston.createLogger({
        level,
        silent: options.silent ?? false,
        defaultMeta: { service: options.service, environment: options.environment },
        format: winston.format.combine(...formats),
        transports
    });
}

export class Logger {
    private logger: winston.Logger;
    private readonly options: LoggerOptions;

    constructor(options: LoggerOptions, base?: winston.Logger) {
        this.options = options;
        this.logger = base ?? createWinstonLogger(options);
    }

    public debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, meta);
    }

    public info(message: string, meta?: LogMeta): void {
        this.logger.info(message, meta);
    }

    public warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, meta);
    }

    public error(message: string, meta?: LogMeta): void {
        this.logger.error(message, meta);
    }

    /**
     * Logger bound to a component name; shares transports with its parent.
     */
    public child(component: string): Logger {
        return new Logger(this.options, this.logger.child({ component }));
    }

    public getWinstonLogger(): winston.Logger {
        return this.logger;
    }
}

let defaultLogger: Logger | null = null;

export function initLogger(options: LoggerOptions): Logger {
    defaultLogger = new Logger(options);
    return defaultLogger;
}

export function getLogger(): Logger {
    if (!defaultLogger) {
        defaultLogger = new Logger({ service: 'content-research', environment: 'development' });
    }
    return defaultLogger;
}
