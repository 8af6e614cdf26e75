import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig, type PackagingConfig } from "./config.js";
import { runPackaging } from "./driver.js";
import type { CommandRunner } from "./runner.js";

const BUILD = [
  "python3",
  "setup.py",
  "--command-packages=stdeb.command",
  "bdist_deb",
];

let projectDir: string;
let config: PackagingConfig;

beforeEach(() => {
  projectDir = mkdtempSync(join(tmpdir(), "driver-test-"));
  mkdirSync(join(projectDir, "hyperspy"));
  writeFileSync(
    join(projectDir, "hyperspy", "Release.py"),
    `version = "1.2.dev0"\n`,
  );
  writeFileSync(join(projectDir, "debpack.yaml"), "name: hyperspy\n");
  config = loadConfig(projectDir, { env: {} });
});

afterEach(() => {
  rmSync(projectDir, { recursive: true, force: true });
});

/** Runner that records commands and lets the build drop files into deb_dist. */
function fakeRunner(artifacts: string[] = []) {
  const calls: string[][] = [];
  const runner = vi.fn<CommandRunner>((command, { cwd }) => {
    calls.push([...command]);
    if (command[0] === "python3") {
      const out = join(cwd, "deb_dist");
      mkdirSync(out, { recursive: true });
      for (const name of artifacts) {
        writeFileSync(join(out, name), "");
      }
    }
  });
  return { runner, calls };
}

describe("runPackaging", () => {
  it("derives the release identifier", () => {
    const { runner } = fakeRunner();

    const result = runPackaging({ projectDir, config, runner });

    expect(result.releaseId).toBe("hyperspy-1.2~dev0");
    expect(result.outputDir).toBe(join(projectDir, "deb_dist"));
  });

  it("only cleans and builds without --install", () => {
    const { runner, calls } = fakeRunner(["foo_1.2_all.deb"]);

    const result = runPackaging({ projectDir, config, runner });

    expect(calls).toEqual([BUILD]);
    expect(result.artifact).toBeUndefined();
  });

  it("removes stale output before building", () => {
    mkdirSync(join(projectDir, "deb_dist"));
    writeFileSync(join(projectDir, "deb_dist", "stale_0.9_all.deb"), "");
    const { runner } = fakeRunner(["foo_1.2_all.deb"]);

    const result = runPackaging({ projectDir, config, runner, install: true });

    expect(result.artifact).toBe(join("deb_dist", "foo_1.2_all.deb"));
    expect(existsSync(join(projectDir, "deb_dist", "stale_0.9_all.deb"))).toBe(
      false,
    );
  });

  it("builds, installs, then repairs with --install", () => {
    const { runner, calls } = fakeRunner(["foo_1.2_all.deb"]);

    runPackaging({ projectDir, config, runner, install: true });

    expect(calls).toEqual([
      BUILD,
      ["sudo", "dpkg", "-i", join("deb_dist", "foo_1.2_all.deb")],
      ["sudo", "apt-get", "install", "-f"],
    ]);
    for (const call of runner.mock.calls) {
      expect(call[1]).toEqual({ cwd: projectDir });
    }
  });

  it("fails before installing when no artifact was built", () => {
    const { runner, calls } = fakeRunner();

    expect(() =>
      runPackaging({ projectDir, config, runner, install: true }),
    ).toThrow(`No artifact matching *.deb in ${join(projectDir, "deb_dist")}`);
    expect(calls).toEqual([BUILD]);
  });

  it("stops when the build command fails", () => {
    const runner = vi.fn<CommandRunner>(() => {
      throw new Error("Command failed: python3 setup.py");
    });

    expect(() =>
      runPackaging({ projectDir, config, runner, install: true }),
    ).toThrow("Command failed: python3 setup.py");
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it("fails without running anything when the version is unreadable", () => {
    rmSync(join(projectDir, "hyperspy", "Release.py"));
    const { runner } = fakeRunner();

    expect(() => runPackaging({ projectDir, config, runner })).toThrow(
      "Version metadata not found",
    );
    expect(runner).not.toHaveBeenCalled();
  });

  it("reports each step through the log callback", () => {
    const { runner } = fakeRunner(["foo_1.2_all.deb"]);
    const log = vi.fn();

    runPackaging({ projectDir, config, runner, install: true, log });

    expect(log.mock.calls.map(([message]) => message)).toEqual([
      "Packaging hyperspy-1.2~dev0",
      "Removed deb_dist",
      "Running python3 setup.py --command-packages=stdeb.command bdist_deb",
      `Running sudo dpkg -i ${join("deb_dist", "foo_1.2_all.deb")}`,
      "Running sudo apt-get install -f",
    ]);
  });
});

describe("runPackaging output directory guard", () => {
  it.each([".", "..", "/"])("refuses to clean %s", (outputDir) => {
    const { runner } = fakeRunner();

    expect(() =>
      runPackaging({
        projectDir,
        config: { ...config, outputDir },
        runner,
      }),
    ).toThrow(`Refusing to clean ${outputDir}: not a subdirectory of`);
    expect(existsSync(join(projectDir, "hyperspy", "Release.py"))).toBe(true);
    expect(runner).not.toHaveBeenCalled();
  });
});
