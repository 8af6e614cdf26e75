import { createRequire } from "node:module";
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { runPackaging } from "./driver.js";
import type { CommandRunner } from "./runner.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

export interface ProgramOptions {
  /** Project directory; defaults to the current working directory */
  cwd?: string;
  runner?: CommandRunner;
}

export function createProgram(options: ProgramOptions = {}): Command {
  return new Command()
    .name("debpack")
    .description("Build a Debian package from a Python project using stdeb")
    .version(version)
    .option(
      "-i, --install",
      "Install the package and repair its dependencies after building",
    )
    .action((flags: { install?: boolean }) => {
      const projectDir = options.cwd ?? process.cwd();
      try {
        const config = loadConfig(projectDir);
        const result = runPackaging({
          projectDir,
          config,
          install: flags.install === true,
          runner: options.runner,
          log: (message) => console.log(message),
        });

        console.log(`✓ Built ${result.releaseId}`);
        if (result.artifact) {
          console.log(`✓ Installed ${result.artifact}`);
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : err}`);
        process.exitCode = 1;
      }
    });
}
