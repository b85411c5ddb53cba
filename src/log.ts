import pino from "pino";
import { Runtime, resolveRuntime } from "./config/runtime.js";
import { isTestEnv } from "./util/env.js";
import { bigintsToStrings } from "./utils/json.js";

type Data = Record<string, unknown>;

/** Silent under the test runner, otherwise the runtime's LOG_LEVEL (trace under VERBOSE). */
export function levelFor(runtime: Pick<Runtime, "logLevel">, testEnv = isTestEnv()): string {
    return testEnv ? "silent" : runtime.logLevel;
}

export function createLogger(runtime: Pick<Runtime, "logLevel"> = resolveRuntime()) {
    return pino({
        base: undefined,
        level: levelFor(runtime),
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    });
}

const root = createLogger();

export type ScopedLogger = {
    info: (msg: string, data?: Data) => void;
    warn: (msg: string, data?: Data) => void;
    error: (msg: string, data?: Data) => void;
    debug: (msg: string, data?: Data) => void;
};

export function withScope(scope: string, base: pino.Logger = root): ScopedLogger {
    const child = base.child({ scope });
    return {
        info: (msg, data) => child.info(data ? bigintsToStrings(data) : {}, msg),
        warn: (msg, data) => child.warn(data ? bigintsToStrings(data) : {}, msg),
        error: (msg, data) => child.error(data ? bigintsToStrings(data) : {}, msg),
        debug: (msg, data) => child.debug(data ? bigintsToStrings(data) : {}, msg),
    };
}

export const log = { root, withScope };
export default log;
