import moment from "moment";
import axios from "axios";

const NEW_RELIC_URL = "https://log-api.newrelic.com/log/v1";

export type LogAttributes = { [key: string]: unknown };

interface LogMessage {
    timestamp: number;
    message: string;
    attributes?: LogAttributes;
}

interface LogBatch {
    common?: {
        attributes: LogAttributes;
    };
    logs: LogMessage[];
}

export interface Logger {
    log(message: string, attributes?: LogAttributes): void;
}

/**
 * Diagnostics go to stderr, and only when verbose. Stdout is reserved for
 * the census lines.
 */
export class ConsoleLogger implements Logger {
    constructor(private verbose: boolean) {}

    public log(message: string, attributes?: LogAttributes) {
        if (!this.verbose) {
            return;
        }
        if (attributes) {
            console.error(message, attributes);
        } else {
            console.error(message);
        }
    }
}

export class LogsClient implements Logger {
    private logs: LogMessage[] = [];
    private interval?: NodeJS.Timeout;

    private get enabled() {
        return !!this.newRelicLicenseKey;
    }

    constructor(
        private newRelicLicenseKey: string | undefined,
        private echo: Logger
    ) {
        if (this.enabled) {
            this.interval = setInterval(() => {
                this.sendLogs().catch((err) => {
                    this.echo.log("LogsClient.sendLogs failed", {
                        error: err instanceof Error ? err.message : String(err),
                    });
                });
            }, 10000);
            this.interval.unref();
        }
    }

    get pending(): number {
        return this.logs.length;
    }

    private async sendLogs() {
        const apiKey = this.newRelicLicenseKey;
        if (!apiKey || this.logs.length === 0) {
            return;
        }
        const data: LogBatch = {
            common: {
                attributes: {
                    service: "ec2-census",
                },
            },
            logs: this.logs,
        };
        this.logs = [];

        await axios.post(NEW_RELIC_URL, [data], {
            headers: {
                "Content-Type": "application/json",
                "Api-Key": apiKey,
            },
        });
    }

    public log(message: string, attributes?: LogAttributes) {
        this.echo.log(message, attributes);
        if (this.enabled) {
            this.logs.push({
                timestamp: moment().unix(),
                message,
                attributes,
            });
        }
    }

    public async stop() {
        if (this.enabled) {
            clearInterval(this.interval);
            await this.sendLogs();
        }
    }
}

export class RecordingLogger implements Logger {
    entries: Array<{ message: string; attributes?: LogAttributes }> = [];

    log(message: string, attributes?: LogAttributes) {
        this.entries.push({ message, attributes });
    }
}
