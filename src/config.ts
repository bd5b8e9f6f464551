import os from "os";
import path from "path";
import dotenv from "dotenv";
dotenv.config();

// Regions are fixed for the program, but travel through Config so that
// tests can substitute their own.
export const DEFAULT_REGIONS: ReadonlyArray<string> = [
    "us-east-1",
    "eu-west-1",
    "eu-west-2",
];

export interface Config {
    awsConfigFile: string;
    regions: ReadonlyArray<string>;
    bugsnagApiKey?: string;
    newRelicLicenseKey?: string;
    verbose: boolean;
}

export const defaultAwsConfigFile = (): string =>
    path.join(os.homedir(), ".aws", "config");

export const loadConfig = (): Config => {
    // SharedIniFileCredentials only reads ~/.aws/config when this is set,
    // and that is where the profiles come from.
    if (!process.env.AWS_SDK_LOAD_CONFIG) {
        process.env.AWS_SDK_LOAD_CONFIG = "1";
    }
    const config: Config = {
        awsConfigFile: process.env.AWS_CONFIG_FILE || defaultAwsConfigFile(),
        regions: DEFAULT_REGIONS,
        bugsnagApiKey: process.env.BUGSNAG_API_KEY || undefined,
        newRelicLicenseKey: process.env.NEW_RELIC_LICENSE_KEY || undefined,
        verbose: process.env.VERBOSE === "true",
    };
    return config;
}
