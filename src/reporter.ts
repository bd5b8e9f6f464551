import { Task, TaskResult, taskLabel } from "./task";

export interface LineSink {
    write(line: string): boolean;
}

export interface Reporter {
    result(result: TaskResult): void;
    unexpected(task: Task, error: unknown): void;
    done(elapsedMs: number): void;
}

function trimDecimals(value: number): string {
    return value.toFixed(3).replace(/\.?0+$/, "");
}

/** 1500 -> "1.5s", 250 -> "250ms", 0.25 -> "250µs", 61000 -> "1m1s" */
export function formatDuration(ms: number): string {
    if (ms <= 0) {
        return "0s";
    }
    if (ms < 1) {
        return `${trimDecimals(ms * 1000)}µs`;
    }
    if (ms < 1000) {
        return `${trimDecimals(ms)}ms`;
    }
    if (ms < 60000) {
        return `${trimDecimals(ms / 1000)}s`;
    }
    const minutes = Math.floor(ms / 60000);
    return `${minutes}m${trimDecimals((ms - minutes * 60000) / 1000)}s`;
}

export function formatResult(result: TaskResult): string {
    if (result.kind === "count") {
        return `[${taskLabel(result.task)}] Running instances: ${result.count}`;
    }
    return result.error.message;
}

/**
 * Each line goes out in a single write so concurrent tasks interleave
 * whole lines only.
 */
export class StreamReporter implements Reporter {
    constructor(private stdout: LineSink, private stderr: LineSink) {}

    result(result: TaskResult): void {
        const sink = result.kind === "count" ? this.stdout : this.stderr;
        sink.write(`${formatResult(result)}\n`);
    }

    unexpected(task: Task, error: unknown): void {
        const message = error instanceof Error ? error.message : String(error);
        this.stderr.write(`[${taskLabel(task)}] unexpected error: ${message}\n`);
    }

    done(elapsedMs: number): void {
        this.stdout.write(`\nDone in ${formatDuration(elapsedMs)}\n`);
    }
}

export class RecordingReporter implements Reporter {
    results: TaskResult[] = [];
    unexpectedErrors: Array<{ task: Task; error: unknown }> = [];
    doneCalls: number[] = [];
    lines: string[] = [];

    result(result: TaskResult): void {
        this.results.push(result);
        this.lines.push(formatResult(result));
    }

    unexpected(task: Task, error: unknown): void {
        this.unexpectedErrors.push({ task, error });
    }

    done(elapsedMs: number): void {
        this.doneCalls.push(elapsedMs);
        this.lines.push(`Done in ${formatDuration(elapsedMs)}`);
    }
}
