import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import pino from "pino";
import { formatPointsSummary, runCli, USAGE } from "../src/cli";
import { loadConfig } from "../src/config";

describe("loyalty-batch CLI", () => {
  let dir: string;
  let out: string[];
  let err: string[];
  const output = {
    out: (line: string) => out.push(line),
    err: (line: string) => err.push(line)
  };

  function options() {
    return {
      config: loadConfig({
        CHECKPOINT_PATH: join(dir, "checkpoint.txt"),
        LOG_LEVEL: "silent"
      }),
      logger: pino({ level: "silent" })
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cli-"));
    out = [];
    err = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("prints usage without a file argument", async () => {
    expect(await runCli([], options(), output)).toBe(1);
    expect(err).toEqual([USAGE]);
    expect(out).toEqual([]);
  });

  test("processes the file and prints the points summary", async () => {
    const file = join(dir, "transactions.csv");
    writeFileSync(
      file,
      [
        "2024-01-01,1234567890123456,GAS123,50.00",
        "2024-01-01,2345678901234567,SHOP456,20.00",
        "2024-01-01,3456789012345678,GAS123,9.99"
      ].join("\n")
    );

    expect(await runCli([file], options(), output)).toBe(0);
    expect(out).toEqual([
      "Processing completed successfully!",
      "Updated Loyalty Points:",
      "------------------------",
      "John Doe: 150 points",
      "Jane Smith: 250 points",
      "Bob Johnson: 59 points"
    ]);
    expect(err).toEqual([]);
    expect(existsSync(join(dir, "checkpoint.txt"))).toBe(false);
    expect(existsSync(join(dir, "checkpoint.txt.lock"))).toBe(false);
  });

  test("reports an I/O error and leaves the checkpoint for a retry", async () => {
    writeFileSync(join(dir, "checkpoint.txt"), "3000");

    expect(await runCli([join(dir, "missing.csv")], options(), output)).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^Error processing file \[PROCESSING_IO\]: Failed to process .*missing\.csv: ENOENT/);
    expect(existsSync(join(dir, "checkpoint.txt"))).toBe(true);
  });

  test("formatPointsSummary lists one line per account", () => {
    expect(
      formatPointsSummary([{ displayName: "Ada", accountIdentifier: "1", pointsBalance: 7 }])
    ).toEqual(["Updated Loyalty Points:", "------------------------", "Ada: 7 points"]);
  });
});
