import { describe, expect, it } from "vitest";
import { APP_VERSION } from "../src/config";
import { StatusManager } from "../src/status";

describe("StatusManager", () => {
  it("starts not ready with zeroed counters", () => {
    const status = new StatusManager({ dataDir: "/tmp/passages" }).getStatus();
    expect(status.version).toBe(APP_VERSION);
    expect(status.dataDir).toBe("/tmp/passages");
    expect(status.transport).toBe("unknown");
    expect(status.ready).toBe(false);
    expect(status.counters).toEqual({
      documentsIndexed: 0,
      passagesIndexed: 0,
      queriesServed: 0,
      documentsRemoved: 0,
      ingestFailures: 0,
    });
  });

  it("accumulates activity and lifecycle changes", () => {
    const manager = new StatusManager();
    manager.markTransport("http");
    manager.recordIndexed(4);
    manager.recordIndexed(0);
    manager.recordQuery();
    manager.recordRemoved();
    manager.recordIngestFailure();
    manager.markReady();

    const status = manager.getStatus();
    expect(status.transport).toBe("http");
    expect(status.ready).toBe(true);
    expect(status.counters).toEqual({
      documentsIndexed: 2,
      passagesIndexed: 4,
      queriesServed: 1,
      documentsRemoved: 1,
      ingestFailures: 1,
    });
  });
});
