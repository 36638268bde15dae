/**
 * Node.js implementations of the core interfaces.
 */

import { execFileSync } from "child_process";
import { existsSync, readFileSync } from "fs";
import type { FileSystem, ShellExecutor } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    exists: (path) => existsSync(path),
  };
}

export function createNodeShell(options: { cwd: string }): ShellExecutor {
  return {
    execFile(command, args) {
      return execFileSync(command, args, {
        cwd: options.cwd,
        encoding: "utf-8",
        stdio: ["ignore", "pipe", "pipe"],
      });
    },
  };
}
