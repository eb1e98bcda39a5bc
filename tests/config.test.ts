import { ZodError } from "zod";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  test("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      TARGET_MERCHANT_ID: "GAS123",
      POINTS_PER_DOLLAR: 1,
      CHECKPOINT_PATH: "checkpoint.txt",
      CHECKPOINT_INTERVAL: 1000,
      LOG_LEVEL: "info"
    });
  });

  test("coerces numeric settings", () => {
    const config = loadConfig({ POINTS_PER_DOLLAR: "2.5", CHECKPOINT_INTERVAL: "250" });
    expect(config.POINTS_PER_DOLLAR).toBe(2.5);
    expect(config.CHECKPOINT_INTERVAL).toBe(250);
  });

  test("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  test("rejects a zero checkpoint interval and a negative rate", () => {
    expect(() => loadConfig({ CHECKPOINT_INTERVAL: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ POINTS_PER_DOLLAR: "-1" })).toThrow(ZodError);
  });
});
