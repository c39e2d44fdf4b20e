import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, sanitize } from "@/lib/logging";

describe("sanitize", () => {
  it("redacts donor contact fields", () => {
    expect(
      sanitize({ donor_email: "jane@example.com", donor_phone: "1(555) 123-4567", rows: 3, step: "dedupe" })
    ).toEqual({ donor_email: "***@example.com", donor_phone: "*(***) ***-****", rows: 3, step: "dedupe" });
  });

  it("reduces errors to name and message", () => {
    expect(sanitize({ error: new TypeError("bad row") })).toEqual({ error: { name: "TypeError", message: "bad row" } });
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("writes one JSON line with the context merged in", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger({ component: "donor-engine" }).child({ mode: "execute" }).error("registry replace failed", {
      records: 2
    });

    expect(spy).toHaveBeenCalledTimes(1);
    const record: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(record).toMatchObject({
      level: "error",
      msg: "registry replace failed",
      component: "donor-engine",
      mode: "execute",
      records: 2
    });
  });

  it("falls back to info for a level name that is not its own", () => {
    vi.stubEnv("LOG_LEVEL", "toString");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    const logger = createLogger();
    logger.debug("rows normalized");
    logger.info("batch reconciled");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
  });

  it("drops messages below the configured level", () => {
    const spy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    createLogger().info("batch reconciled");
    expect(spy).not.toHaveBeenCalled();
  });
});
