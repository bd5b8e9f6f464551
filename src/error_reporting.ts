import Bugsnag from "@bugsnag/js";

let started = false;

export function startErrorReporting(apiKey: string): void {
    Bugsnag.start({
        apiKey,
        // stdout carries the census output
        logger: null,
    });
    started = true;
}

export function reportError(error: Error, context: string): void {
    if (!started) {
        return;
    }
    Bugsnag.notify(error, (evt) => {
        evt.context = context;
    });
}
