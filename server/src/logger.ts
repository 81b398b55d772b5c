export type LogFn = (message: string) => void;

let sink: LogFn = (message: string) => console.log(message);
let errorSink: LogFn = (message: string) => console.error(message);

export const setLogger = (logger: LogFn, errorLogger: LogFn = logger) => {
    sink = logger;
    errorSink = errorLogger;
};

/** Returns a logger that prefixes every line with a component tag, e.g. `[INGEST]`. */
export const createLogger = (tag: string) => ({
    info: (message: string) => sink(`[${tag}] ${message}`),
    error: (message: string) => errorSink(`[${tag}] ${message}`),
});
