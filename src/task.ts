import { TaskError } from "./errors";

export type Task = Readonly<{
    profile: string;
    region: string;
}>;

export type TaskResult =
    | { kind: "count"; task: Task; count: number }
    | { kind: "error"; task: Task; error: TaskError };

export interface TaskCounter {
    count(task: Task): Promise<TaskResult>;
}

export function taskLabel(task: Task): string {
    return `${task.profile}/${task.region}`;
}

/**
 * Every profile crossed with every region, profiles outermost. Each task is
 * its own frozen object so concurrent work never shares a pair.
 */
export function buildTasks(
    profiles: ReadonlyArray<string>,
    regions: ReadonlyArray<string>
): Task[] {
    const tasks: Task[] = [];
    for (const profile of profiles) {
        for (const region of regions) {
            tasks.push(Object.freeze({ profile, region }));
        }
    }
    return tasks;
}
