export interface Logger {
    debug: (messageOrLambda: () => string, namespace: string) => void;
    info: (messageOrLambda: string | (() => string), namespace: string) => void;
    warning: (messageOrLambda: string | (() => string), namespace: string) => void;
    error: (messageOrLambda: string | (() => string), namespace: string) => void;
}

const resolve = (messageOrLambda: string | (() => string)): string => (typeof messageOrLambda === "function" ? messageOrLambda() : messageOrLambda);

const format = (messageOrLambda: string | (() => string), namespace: string): string =>
    `[${new Date().toISOString()}] telink-mesh:${namespace}: ${resolve(messageOrLambda)}`;

/* v8 ignore next -- @preserve */
export const consoleLogger: Logger = {
    debug: (messageOrLambda, namespace) => console.debug(format(messageOrLambda, namespace)),
    info: (messageOrLambda, namespace) => console.info(format(messageOrLambda, namespace)),
    warning: (messageOrLambda, namespace) => console.warn(format(messageOrLambda, namespace)),
    error: (messageOrLambda, namespace) => console.error(format(messageOrLambda, namespace)),
};

/** Discards everything, lambdas are never evaluated */
export const noopLogger: Logger = {
    debug: () => {},
    info: () => {},
    warning: () => {},
    error: () => {},
};

export let logger: Logger = consoleLogger;

export function setLogger(l: Logger): void {
    logger = l;
}
