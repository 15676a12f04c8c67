import winston from 'winston';
import { config } from './config';

const logger = winston.createLogger({
	level: config.logLevel,
	format: winston.format.combine(
		winston.format.timestamp({
			format: 'YYYY-MM-DD HH:mm:ss.SSS',
		}),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(({ level, message, timestamp, stack }) => {
			const levelUpper = level.toUpperCase().padEnd(5);
			if (stack) {
				return `${timestamp} [${levelUpper}] ${message}\n${stack}`;
			}
			return `${timestamp} [${levelUpper}] ${message}`;
		}),
	),
	transports: [new winston.transports.Console()],
});

export default logger;
