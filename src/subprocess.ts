import { spawn } from "child_process";
import { CommandFailedError } from "./errors";

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

function commandLine(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].join(" ");
}

/** Runs a command with inherited stdio. Rejects on spawn failure or non-zero exit. */
export function runCommand(
  cmd: string,
  args: readonly string[],
  options: { cwd?: string } = {}
): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, [...args], { cwd: options.cwd, stdio: "inherit" });

    child.on("error", (error: Error) => reject(error));
    child.on("close", (code: number | null) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new CommandFailedError(commandLine(cmd, args), code));
      }
    });
  });
}

/** Runs a command and collects its output. Rejects on spawn failure or non-zero exit. */
export function runCommandCapture(
  cmd: string,
  args: readonly string[],
  options: { cwd?: string } = {}
): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, [...args], { cwd: options.cwd });
    let stdout = "";
    let stderr = "";

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error: Error) => reject(error));
    child.on("close", (code: number | null) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new CommandFailedError(commandLine(cmd, args), code, stderr));
      }
    });
  });
}

/** Probes `cmd` with `probeArgs`; any spawn failure or non-zero exit means unavailable. */
export async function isCommandAvailable(
  cmd: string,
  probeArgs: readonly string[] = ["--version"]
): Promise<boolean> {
  try {
    await runCommandCapture(cmd, probeArgs);
    return true;
  } catch {
    return false;
  }
}
