import pino from "pino";

export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error">;

export type LogLevel = pino.LevelWithSilent;

export const makeLogger = (
  level: LogLevel = "info",
  opts: { pretty?: boolean } = {},
): ILogger =>
  pino({
    level,
    name: "threshold-gateway",
    ...(opts.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

export const silentLogger = (): ILogger => makeLogger("silent");
