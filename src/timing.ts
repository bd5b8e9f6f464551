import { Clock } from "./clock";
import { Reporter } from "./reporter";

export async function timed(
    clock: Clock,
    reporter: Reporter,
    fn: () => Promise<void>
): Promise<number> {
    const start = clock.now();
    await fn();
    const elapsed = clock.now().diff(start, "milliseconds");
    reporter.done(elapsed);
    return elapsed;
}
