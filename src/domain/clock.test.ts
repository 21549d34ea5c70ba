import { createMonotonicClock, secondsBetween, systemClock } from "./clock";

describe("createMonotonicClock", () => {
  it("passes through readings that move forward", () => {
    const readings = [1000, 1500, 2000];
    const clock = createMonotonicClock(() => readings.shift() ?? 0);

    expect([clock.now(), clock.now(), clock.now()]).toEqual([1000, 1500, 2000]);
  });

  it("bumps repeated readings within the same millisecond", () => {
    const clock = createMonotonicClock(() => 1000);

    expect([clock.now(), clock.now(), clock.now()]).toEqual([1000, 1001, 1002]);
  });

  it("never goes backwards when the source does", () => {
    const readings = [1000, 1000, 999, 1005];
    const clock = createMonotonicClock(() => readings.shift() ?? 0);

    expect([clock.now(), clock.now(), clock.now(), clock.now()]).toEqual([1000, 1001, 1002, 1005]);
  });
});

describe("systemClock", () => {
  it("gives distinct stamps when Date.now repeats", () => {
    jest.spyOn(Date, "now").mockReturnValue(4_000_000_000_000);

    const first = systemClock.now();
    const second = systemClock.now();

    expect(second).toBeGreaterThan(first);
    jest.restoreAllMocks();
  });
});

describe("secondsBetween", () => {
  it("converts milliseconds to seconds", () => {
    expect(secondsBetween(1000, 46_000)).toBe(45);
  });
});
