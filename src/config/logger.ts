import { createLogger, format, transports, type Logger } from "winston";
import "winston-daily-rotate-file";
import * as path from "node:path";
import config from ".";

const line = format.combine(
	format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	format.printf(({ level, message, timestamp }) => `${timestamp} | [ ${level.toUpperCase()} ]: ${message}`),
);

function rotatingFile(name: string, level?: string) {
	return new transports.DailyRotateFile({
		filename: path.join(config.LOG_PATH, "logs", `${name}-%DATE%.log`),
		datePattern: config.LOG_DATE_PATTERN,
		maxSize: config.LOG_MAX_SIZE,
		maxFiles: "14d",
		zippedArchive: true,
		format: line,
		level,
	});
}

const logger: Logger = createLogger({
	level: config.LOG_LEVEL,
	silent: config.NODE_ENV === "test",
	transports: [new transports.Console({ format: format.combine(line, format.colorize({ all: true })) })],
});

if (config.LOG_FILE_GENERATION_SUPPORT) {
	logger.add(rotatingFile("log"));
	logger.add(rotatingFile("errors", "error"));
}

export default logger;
