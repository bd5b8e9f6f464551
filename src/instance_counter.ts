import * as AWS from "aws-sdk";
import { CredentialError, ServiceError } from "./errors";
import { reportError } from "./error_reporting";
import { sleep } from "./sleep";
import { Task, TaskCounter, TaskResult } from "./task";

export const RUNNING_STATE = "running";

export interface EC2Client {
    resolveCredentials(
        profile: string,
        region: string
    ): Promise<AWS.Credentials>;

    describeInstances(
        credentials: AWS.Credentials,
        region: string
    ): Promise<AWS.EC2.Reservation[]>;
}

export function countRunning(
    reservations: ReadonlyArray<AWS.EC2.Reservation> | undefined
): number {
    let count = 0;
    for (const reservation of reservations || []) {
        for (const instance of reservation.Instances || []) {
            if (instance.State?.Name === RUNNING_STATE) {
                count++;
            }
        }
    }
    return count;
}

export class InstanceCounter implements TaskCounter {
    constructor(private ec2Client: EC2Client) {}

    async count(task: Task): Promise<TaskResult> {
        const { profile, region } = task;
        let credentials: AWS.Credentials;
        try {
            credentials = await this.ec2Client.resolveCredentials(
                profile,
                region
            );
        } catch (err) {
            const error = new CredentialError(profile, region, err);
            reportError(error, "InstanceCounter.resolveCredentials");
            return { kind: "error", task, error };
        }

        let reservations: AWS.EC2.Reservation[];
        try {
            reservations = await this.ec2Client.describeInstances(
                credentials,
                region
            );
        } catch (err) {
            const error = new ServiceError(profile, region, err);
            reportError(error, "InstanceCounter.describeInstances");
            return { kind: "error", task, error };
        }
        return { kind: "count", task, count: countRunning(reservations) };
    }
}

/**
 * Static keys and assumed roles, then SSO, then credential_process, all
 * scoped to the named profile.
 */
export function credentialProviders(
    profile: string
): Array<() => AWS.Credentials> {
    return [
        () => new AWS.SharedIniFileCredentials({ profile }),
        () => new AWS.SsoCredentials({ profile }),
        () => new AWS.ProcessCredentials({ profile }),
    ];
}

export class EC2ClientImpl implements EC2Client {
    async resolveCredentials(
        profile: string,
        region: string
    ): Promise<AWS.Credentials> {
        // none of these providers depend on the region
        const chain = new AWS.CredentialProviderChain(
            credentialProviders(profile)
        );
        return chain.resolvePromise();
    }

    async describeInstances(
        credentials: AWS.Credentials,
        region: string
    ): Promise<AWS.EC2.Reservation[]> {
        const ec2 = new AWS.EC2({ region, credentials });
        const result = await ec2.describeInstances({}).promise();
        if (result.$response.error) {
            throw result.$response.error;
        }
        return result.Reservations || [];
    }
}

export interface FakeScope {
    reservations?: AWS.EC2.Reservation[];
    delayMs?: number;
    credentialError?: Error;
    serviceError?: Error;
}

/**
 * Scopes are keyed by "profile/region". The fake hands out credentials whose
 * access key id is the profile name so describeInstances can find its scope.
 */
export class FakeEC2Client implements EC2Client {
    calls: string[] = [];

    constructor(public scopes: { [key: string]: FakeScope }) {}

    async resolveCredentials(
        profile: string,
        region: string
    ): Promise<AWS.Credentials> {
        const scope = this.scopes[`${profile}/${region}`];
        if (scope?.credentialError) {
            this.calls.push(`${profile}/${region}`);
            throw scope.credentialError;
        }
        return new AWS.Credentials({
            accessKeyId: profile,
            secretAccessKey: "test-secret",
        });
    }

    async describeInstances(
        credentials: AWS.Credentials,
        region: string
    ): Promise<AWS.EC2.Reservation[]> {
        const key = `${credentials.accessKeyId}/${region}`;
        this.calls.push(key);
        const scope = this.scopes[key];
        if (scope?.delayMs) {
            await sleep(scope.delayMs);
        }
        if (scope?.serviceError) {
            throw scope.serviceError;
        }
        return scope?.reservations || [];
    }
}
