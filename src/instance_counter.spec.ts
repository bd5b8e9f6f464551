import * as AWS from "aws-sdk";
import { CredentialError, ServiceError } from "./errors";
import {
    countRunning,
    credentialProviders,
    FakeEC2Client,
    InstanceCounter,
} from "./instance_counter";

function reservation(...states: Array<string | undefined>): AWS.EC2.Reservation {
    return {
        Instances: states.map((state, i) => ({
            InstanceId: `i-${i}`,
            State: state === undefined ? undefined : { Name: state },
        })),
    };
}

describe("countRunning", () => {
    it("should count running instances across reservations", () => {
        expect(
            countRunning([
                reservation("running", "stopped"),
                reservation("running", "running", "terminated"),
            ])
        ).toBe(3);
    });

    it("should skip instances without a state", () => {
        expect(countRunning([reservation(undefined, "running"), {}])).toBe(1);
    });

    it("should return 0 for no reservations", () => {
        expect(countRunning([])).toBe(0);
        expect(countRunning(undefined)).toBe(0);
    });

    it("should require an exact match", () => {
        expect(countRunning([reservation("Running", "pending")])).toBe(0);
    });
});

describe("InstanceCounter", () => {
    let ec2Client: FakeEC2Client;
    let counter: InstanceCounter;

    beforeEach(() => {
        ec2Client = new FakeEC2Client({
            "dev/us-east-1": {
                reservations: [reservation("running", "stopped", "running")],
            },
            "dev/eu-west-1": {
                credentialError: new Error("profile dev not found"),
            },
            "prod/us-east-1": {
                serviceError: new Error("UnauthorizedOperation"),
            },
        });
        counter = new InstanceCounter(ec2Client);
    });

    it("should return the running count", async () => {
        const task = { profile: "dev", region: "us-east-1" };
        const result = await counter.count(task);
        expect(result).toEqual({ kind: "count", task, count: 2 });
    });

    it("should return the same count twice", async () => {
        const task = { profile: "dev", region: "us-east-1" };
        const first = await counter.count(task);
        const second = await counter.count(task);
        expect(second).toEqual(first);
    });

    it("should return 0 for a scope with no reservations", async () => {
        const result = await counter.count({ profile: "qa", region: "us-east-1" });
        expect(result.kind).toBe("count");
        if (result.kind === "count") {
            expect(result.count).toBe(0);
        }
    });

    it("should wrap credential failures", async () => {
        const result = await counter.count({ profile: "dev", region: "eu-west-1" });
        expect(result.kind).toBe("error");
        if (result.kind === "error") {
            expect(result.error).toBeInstanceOf(CredentialError);
            expect(result.error.message).toBe(
                "[dev/eu-west-1] config error: profile dev not found"
            );
        }
    });

    it("should wrap describe failures", async () => {
        const result = await counter.count({ profile: "prod", region: "us-east-1" });
        expect(result.kind).toBe("error");
        if (result.kind === "error") {
            expect(result.error).toBeInstanceOf(ServiceError);
            expect(result.error.message).toBe(
                "[prod/us-east-1] describe error: UnauthorizedOperation"
            );
        }
    });

    it("should issue one describe call per count", async () => {
        await counter.count({ profile: "dev", region: "us-east-1" });
        await counter.count({ profile: "dev", region: "eu-west-1" });
        expect(ec2Client.calls).toEqual(["dev/us-east-1", "dev/eu-west-1"]);
    });
});

describe("credentialProviders", () => {
    it("should try shared-ini, then SSO, then credential_process", () => {
        const providers = credentialProviders("dev");
        expect(providers.length).toBe(3);
        expect(providers.map((p) => p.toString())).toEqual([
            expect.stringContaining("SharedIniFileCredentials"),
            expect.stringContaining("SsoCredentials"),
            expect.stringContaining("ProcessCredentials"),
        ]);
    });
});
