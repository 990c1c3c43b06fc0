/**
 * JVM launcher: spawns `java` with inherited stdio and resolves with the
 * exit code once the process ends. One process at a time; callers await
 * each run before starting the next.
 */

import { spawn } from "child_process";

import { configurationError } from "../shared/errors.js";
import type { JavaRunner } from "./types.js";

export class SpawnJavaRunner implements JavaRunner {
  private javaBin: string;

  constructor(javaBin = "java") {
    this.javaBin = javaBin;
  }

  run(args: string[]): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.javaBin, args, { stdio: "inherit" });
      child.once("error", (err) => {
        reject(configurationError(`Cannot launch ${this.javaBin}: ${err.message}`));
      });
      child.once("close", (code) => {
        // Killed by a signal: no exit code, report failure.
        resolve(code ?? 1);
      });
    });
  }
}
