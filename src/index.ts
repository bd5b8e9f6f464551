#!/usr/bin/env node
import { Census } from "./census";
import { RealClock } from "./clock";
import { loadConfig } from "./config";
import { ConfigurationError } from "./errors";
import { reportError, startErrorReporting } from "./error_reporting";
import { EC2ClientImpl, InstanceCounter } from "./instance_counter";
import { ConsoleLogger, LogsClient } from "./logs";
import { IniProfileSource } from "./profile_source";
import { StreamReporter } from "./reporter";

async function main() {
    const config = loadConfig();
    if (config.bugsnagApiKey) {
        startErrorReporting(config.bugsnagApiKey);
    }
    const logger = new LogsClient(
        config.newRelicLicenseKey,
        new ConsoleLogger(config.verbose)
    );
    const census = new Census(
        config,
        new IniProfileSource(config.awsConfigFile),
        new InstanceCounter(new EC2ClientImpl()),
        new StreamReporter(process.stdout, process.stderr),
        new RealClock(),
        logger
    );

    try {
        const report = await census.run();
        logger.log("Census finished", { ...report });
    } catch (err) {
        if (!(err instanceof ConfigurationError)) {
            throw err;
        }
        process.stderr.write(`Failed to get profiles: ${err.message}\n`);
        reportError(err, "Census.listProfiles");
        process.exitCode = 1;
    } finally {
        await logger.stop();
    }
}

main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
