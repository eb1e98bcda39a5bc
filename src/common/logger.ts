import pino, { type Logger } from "pino";
import { config } from "../config";

// stdout is reserved for the points summary
export function createLogger(level: string = config.LOG_LEVEL): Logger {
  return pino({ name: "loyalty-batch", level }, pino.destination(2));
}
