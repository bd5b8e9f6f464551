import { Clock } from "./clock";
import { Config } from "./config";
import { Logger } from "./logs";
import { ParallelRunner } from "./parallel_runner";
import { ProfileSource } from "./profile_source";
import { Reporter } from "./reporter";
import { SequentialRunner } from "./sequential_runner";
import { buildTasks, TaskCounter } from "./task";
import { timed } from "./timing";

export interface CensusReport {
    taskCount: number;
    sequentialMs: number;
    parallelMs: number;
}

/**
 * Loads the profiles, then counts running instances for every
 * profile/region pair twice: sequentially, then in parallel. Each pass is
 * followed by its elapsed time.
 *
 * A ConfigurationError from the profile source is thrown before any task
 * runs. Task failures are reported and never thrown.
 */
export class Census {
    private sequential: SequentialRunner;
    private parallel: ParallelRunner;

    constructor(
        private config: Config,
        private profileSource: ProfileSource,
        counter: TaskCounter,
        private reporter: Reporter,
        private clock: Clock,
        private logger: Logger
    ) {
        this.sequential = new SequentialRunner(counter, reporter);
        this.parallel = new ParallelRunner(counter, reporter);
    }

    async run(): Promise<CensusReport> {
        const profiles = await this.profileSource.listProfiles();
        const tasks = buildTasks(profiles, this.config.regions);
        this.logger.log("Census.run", {
            profiles: profiles.length,
            regions: this.config.regions.length,
            tasks: tasks.length,
        });

        const sequentialMs = await timed(this.clock, this.reporter, () =>
            this.sequential.run(tasks)
        );
        this.logger.log("Census.sequential complete", { elapsedMs: sequentialMs });

        const parallelMs = await timed(this.clock, this.reporter, () =>
            this.parallel.run(tasks)
        );
        this.logger.log("Census.parallel complete", { elapsedMs: parallelMs });

        return {
            taskCount: tasks.length,
            sequentialMs,
            parallelMs,
        };
    }
}
