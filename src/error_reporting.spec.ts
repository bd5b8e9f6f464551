jest.mock("@bugsnag/js", () => ({
    __esModule: true,
    default: { start: jest.fn(), notify: jest.fn() },
}));

import Bugsnag from "@bugsnag/js";
import { reportError, startErrorReporting } from "./error_reporting";

describe("error reporting", () => {
    it("should do nothing before it is started", () => {
        reportError(new Error("boom"), "InstanceCounter.describeInstances");
        expect(Bugsnag.notify).not.toHaveBeenCalled();
    });

    it("should notify once started", () => {
        startErrorReporting("test-bugsnag-key");
        expect(Bugsnag.start).toHaveBeenCalledWith({
            apiKey: "test-bugsnag-key",
            logger: null,
        });
        const error = new Error("boom");
        reportError(error, "InstanceCounter.describeInstances");
        expect(Bugsnag.notify).toHaveBeenCalledWith(error, expect.any(Function));
    });
});
