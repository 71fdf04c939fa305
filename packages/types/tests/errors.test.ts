import { describe, it, expect } from "vitest";
import {
  BillingError,
  ConfigMissingError,
  ImmutablePeriodError,
  ProviderError,
  ValidationError,
} from "../src/errors.js";
import { ManualClock } from "../src/clock.js";

describe("error taxonomy", () => {
  it("subclasses carry stable codes and stay BillingErrors", () => {
    const err = new ValidationError("bad item", "CURRENCY_MISMATCH");
    expect(err).toBeInstanceOf(BillingError);
    expect(err.code).toBe("CURRENCY_MISMATCH");
    expect(err.name).toBe("ValidationError");
  });

  it("maps provider failure kind to a code", () => {
    expect(new ProviderError("card", "transient", "timeout").code).toBe("PROVIDER_TRANSIENT");
    expect(new ProviderError("card", "permanent", "insufficient_funds").code).toBe(
      "PROVIDER_PERMANENT",
    );
  });

  it("names the missing config key", () => {
    const err = new ConfigMissingError("royalty_rate", "tip", "2026-01-01T00:00:00.000Z");
    expect(err.message).toBe(
      'No "royalty_rate" configuration for key "tip" effective at 2026-01-01T00:00:00.000Z',
    );
  });

  it("records the locked period", () => {
    const period = { start: "2026-01-01T00:00:00.000Z", end: "2026-02-01T00:00:00.000Z" };
    const err = new ImmutablePeriodError("author-1", period);
    expect(err.period).toEqual(period);
    expect(err.code).toBe("IMMUTABLE_PERIOD");
  });
});

describe("ManualClock", () => {
  it("starts at the given instant and advances by days", () => {
    const clock = new ManualClock("2026-03-01T00:00:00.000Z");
    clock.advanceDays(3);
    expect(clock.now().toISOString()).toBe("2026-03-04T00:00:00.000Z");
  });

  it("returns a fresh Date each call", () => {
    const clock = new ManualClock("2026-03-01T00:00:00.000Z");
    const a = clock.now();
    a.setUTCFullYear(1999);
    expect(clock.now().toISOString()).toBe("2026-03-01T00:00:00.000Z");
  });
});
