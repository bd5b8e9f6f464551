import { Reporter } from "./reporter";
import { Task, TaskCounter } from "./task";

/**
 * Starts every task at once and waits for all of them. There is no
 * concurrency cap, timeout or cancellation: a hung request holds up the
 * whole pass.
 */
export class ParallelRunner {
    constructor(private counter: TaskCounter, private reporter: Reporter) {}

    async run(tasks: ReadonlyArray<Task>): Promise<void> {
        await Promise.all(tasks.map((task) => this.runOne(task)));
    }

    // Never rejects, so one failure cannot short-circuit Promise.all.
    private async runOne(task: Task): Promise<void> {
        try {
            this.reporter.result(await this.counter.count(task));
        } catch (err) {
            this.reporter.unexpected(task, err);
        }
    }
}
