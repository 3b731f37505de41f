import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import { createProgram } from "../src/cli.js";

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Pins the host and directory used for path rewrites so output does not
 * depend on the machine running the tests
 */
export function writeTestConfig(dir: string, extra = ""): string {
  const configPath = path.join(dir, "batchguard.yaml");
  fs.writeFileSync(
    configPath,
    `submitHost: test-host\nworkingDirectory: /work\ndefaultServer: svr1\nmaxLicenses: 100\n${extra}`
  );
  return configPath;
}

/**
 * Runs the CLI and returns everything written through console.log
 */
export async function runCli(args: string[]): Promise<string[]> {
  const program = createProgram();
  program.exitOverride();

  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  const stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

  try {
    await program.parseAsync(["node", "batchguard", ...args]);
    return logSpy.mock.calls.map((call) => call.map((arg) => String(arg)).join(" "));
  } finally {
    logSpy.mockRestore();
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
  }
}
