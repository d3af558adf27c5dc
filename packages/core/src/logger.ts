type Level = "trace" | "debug" | "info" | "warn" | "error";
type Format = "json" | "pretty";

interface BaseCtx {
  service?: string;
  document?: string;
  tier?: string;
  job_id?: string;
  req_id?: string;
}

interface LogOptions {
  level?: Level;
  format?: Format;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function isLevel(v: string | undefined): v is Level {
  return LEVELS.some((l) => l === v);
}

function nowISO() { return new Date().toISOString(); }

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const lvl: Level = opts.level ?? (isLevel(envLevel) ? envLevel : "info");
  const fmt: Format = opts.format ?? (process.env.LOG_FORMAT === "json" ? "json" : "pretty");

  function emit(base: BaseCtx, level: Level, msg: string, extra?: LogContext) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    if (fmt === "json") {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ ts: nowISO(), level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx = { ...rest, ...(extra || {}) };
    const head = `[${nowISO()}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    // eslint-disable-next-line no-console
    console.log(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
