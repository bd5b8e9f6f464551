function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/** The profile list could not be read. Fatal for the whole run. */
export class ConfigurationError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = "ConfigurationError";
    }
}

/**
 * A failure scoped to one profile/region pair. These are reported and
 * the run carries on.
 */
export abstract class TaskError extends Error {
    constructor(
        public readonly profile: string,
        public readonly region: string,
        phase: string,
        public readonly cause: unknown
    ) {
        super(`[${profile}/${region}] ${phase} error: ${describeCause(cause)}`);
    }
}

export class CredentialError extends TaskError {
    constructor(profile: string, region: string, cause: unknown) {
        super(profile, region, "config", cause);
        this.name = "CredentialError";
    }
}

export class ServiceError extends TaskError {
    constructor(profile: string, region: string, cause: unknown) {
        super(profile, region, "describe", cause);
        this.name = "ServiceError";
    }
}
