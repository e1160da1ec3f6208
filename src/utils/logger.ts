import pino from "pino";
import { config } from "../config";

export const logger = pino({
	level: config.logging.level,
	base: { app: "squeeze-monitor" },
	timestamp: pino.stdTimeFunctions.isoTime,
	serializers: { error: pino.stdSerializers.err },
	transport: process.stdout.isTTY
		? { target: "pino-pretty", options: { colorize: true } }
		: undefined,
});
