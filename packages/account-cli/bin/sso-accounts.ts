#!/usr/bin/env node
import { createAccountsProgram } from "../src/cli/program.js";
import { createRuntimeDependencies } from "../src/runtime.js";

const run = async (): Promise<void> => {
  const program = createAccountsProgram(createRuntimeDependencies());
  await program.parseAsync(process.argv);
};

run().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
