import pino, { type Logger, type LevelWithSilent } from "pino";

// Ink owns stdout, so records only ever go to a file.
let root: Logger = pino({ level: "silent" });

export interface LoggerOptions {
  level: LevelWithSilent;
  file: string;
}

export function initLogger(options: LoggerOptions): Logger {
  root = pino(
    {
      level: options.level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: options.file, mkdir: true, sync: true })
  );
  return root;
}

export function getLogger(component: string): Logger {
  return root.child({ component });
}
