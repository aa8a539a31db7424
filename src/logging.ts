import pino from "pino";
import { loadConfig } from "./config";

export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error" | "child">;

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  pretty = false,
): pino.Logger =>
  pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });

let root: pino.Logger | undefined;

export const rootLogger = (): pino.Logger => {
  if (!root) {
    const cfg = loadConfig();
    root = makeLogger(cfg.logLevel, cfg.logPretty);
  }
  return root;
};

export const moduleLogger = (module: string, parent?: ILogger): ILogger =>
  (parent ?? rootLogger()).child({ module });
