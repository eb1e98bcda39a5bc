#!/usr/bin/env node
import "dotenv/config";
import { AppError } from "./common/errors";
import { Account } from "./modules/accounts/repository";
import { ContainerOptions, createContainer } from "./di";

export const USAGE = "Usage: loyalty-batch <transaction_file_path>";

type Output = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const stdio: Output = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`)
};

export function formatPointsSummary(accounts: Account[]): string[] {
  return [
    "Updated Loyalty Points:",
    "------------------------",
    ...accounts.map((account) => `${account.displayName}: ${account.pointsBalance} points`)
  ];
}

export async function runCli(
  args: string[],
  options: ContainerOptions = {},
  output: Output = stdio
): Promise<number> {
  const [filePath] = args;
  if (!filePath) {
    output.err(USAGE);
    return 1;
  }

  const container = createContainer(options);
  try {
    const summary = await container.processor.processFile(filePath);
    output.out("Processing completed successfully!");
    for (const line of formatPointsSummary(summary.accounts)) {
      output.out(line);
    }
    return 0;
  } catch (error) {
    const code = error instanceof AppError ? error.code : "INTERNAL_ERROR";
    const message = error instanceof Error ? error.message : String(error);
    output.err(`Error processing file [${code}]: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
