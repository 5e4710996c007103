/**
 * Tiny structured logger with namespaces.
 *
 * Every line goes to stderr: stdout is reserved for the sensor result document.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=fa-prtg -> service tag (optional)
 */

type LevelName = "trace" | "debug" | "info" | "warn" | "error";

type LevelMap = Record<LevelName, number>;

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

const LEVELS: LevelMap = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
    const name = (raw || "info").toLowerCase();
    return isLevelName(name) ? LEVELS[name] : LEVELS.info;
}

const ENABLED = process.env.LOG_ENABLED !== "0";
const MIN_LEVEL = resolveMinLevel(process.env.LOG_LEVEL);
const AS_JSON = process.env.LOG_JSON === "1";
const SERVICE = process.env.LOG_SERVICE_NAME || "";

function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(err)) {
            if (key !== "message" && key !== "name" && key !== "stack") extra[key] = value;
        }
        if (err.cause !== undefined) extra.cause = serializeError(err.cause);
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
        };
    }
    return err;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.join(":");
    return String(ns);
}

function normalizeMeta(meta: LogMeta): LogMeta {
    const out: LogMeta = { ...meta };
    if (out.error) out.error = serializeError(out.error);
    if (out.err) out.err = serializeError(out.err);
    return out;
}

function baseLog({ ns }: { ns?: string | string[] }): Logger {
    const namespace = joinNamespace(ns);

    const write = (lvl: LevelName, msg: unknown, meta?: LogMeta) => {
        if (!ENABLED || LEVELS[lvl] < MIN_LEVEL) return;

        const payload = {
            ts: new Date().toISOString(),
            level: lvl,
            ns: namespace || undefined,
            service: SERVICE || undefined,
            pid: process.pid,
            msg: String(msg ?? ""),
            ...(meta ? { meta: normalizeMeta(meta) } : {}),
        };

        if (AS_JSON) {
            process.stderr.write(`${safeStringify(payload)}\n`);
            return;
        }

        const tags = [
            `[${payload.ts}]`,
            SERVICE && `[${SERVICE}]`,
            `[${lvl.toUpperCase()}]`,
            namespace && `[${namespace}]`,
        ]
            .filter(Boolean)
            .join(" ");

        const tail = payload.meta ? ` ${safeStringify(payload.meta)}` : "";
        process.stderr.write(`${tags} ${payload.msg}${tail}\n`);
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog({ ns: merged });
    };

    return {
        trace: (m, meta) => write("trace", m, meta),
        debug: (m, meta) => write("debug", m, meta),
        info: (m, meta) => write("info", m, meta),
        warn: (m, meta) => write("warn", m, meta),
        error: (m, meta) => write("error", m, meta),
        child,
    };
}

const logger = baseLog({ ns: "" });

export default logger;
