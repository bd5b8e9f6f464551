import { Reporter } from "./reporter";
import { Task, TaskCounter } from "./task";

/** One task at a time, in the order given. */
export class SequentialRunner {
    constructor(private counter: TaskCounter, private reporter: Reporter) {}

    async run(tasks: ReadonlyArray<Task>): Promise<void> {
        for (const task of tasks) {
            try {
                this.reporter.result(await this.counter.count(task));
            } catch (err) {
                this.reporter.unexpected(task, err);
            }
        }
    }
}
