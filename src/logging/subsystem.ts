import { Logger, type ILogObj } from "tslog";

const LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LEVELS)[number];

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  child: (name: string) => SubsystemLogger;
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  const match = LEVELS.find((level) => level === normalized);
  return match ?? "info";
}

let rootLogger: Logger<ILogObj> | null = null;

function getRootLogger(): Logger<ILogObj> {
  if (rootLogger) {
    return rootLogger;
  }
  const level = resolveLogLevel(process.env.TPG_SWEEP_LOG_LEVEL);
  rootLogger = new Logger<ILogObj>({
    name: "tpg-sweep",
    minLevel: LEVELS.indexOf(level),
    // vitest sets VITEST; keep test output clean
    type: process.env.VITEST ? "hidden" : "pretty",
    hideLogPositionForProduction: true,
  });
  return rootLogger;
}

function wrap(subsystem: string, logger: Logger<ILogObj>): SubsystemLogger {
  return {
    subsystem,
    debug: (message) => {
      logger.debug(message);
    },
    info: (message) => {
      logger.info(message);
    },
    warn: (message) => {
      logger.warn(message);
    },
    error: (message) => {
      logger.error(message);
    },
    child: (name) => {
      const childName = `${subsystem}/${name}`;
      return wrap(childName, logger.getSubLogger({ name: childName }));
    },
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem, getRootLogger().getSubLogger({ name: subsystem }));
}
