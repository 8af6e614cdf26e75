/**
 * Packaging driver: clean, build, and optionally install a Debian package.
 *
 * Steps run strictly in sequence; each external command blocks until it
 * exits. A failing step throws and nothing after it runs.
 */

import { join, resolve } from "node:path";
import { cleanOutputDir, findFirstArtifact } from "./artifact.js";
import { isInsideProject, type PackagingConfig } from "./config.js";
import { readProjectVersion, toReleaseIdentifier } from "./release.js";
import { type CommandRunner, execRunner, formatCommand } from "./runner.js";

export interface PackagingOptions {
  projectDir: string;
  config: PackagingConfig;
  /** Install the artifact and repair dependencies after building */
  install?: boolean;
  runner?: CommandRunner;
  log?: (message: string) => void;
}

export interface PackagingResult {
  releaseId: string;
  /** Absolute path of the build-output directory */
  outputDir: string;
  /** Artifact path as passed to the install command (only when installing) */
  artifact?: string;
}

export function runPackaging(options: PackagingOptions): PackagingResult {
  const { config, install = false, runner = execRunner } = options;
  const log = options.log ?? (() => {});
  const cwd = resolve(options.projectDir);

  const version = readProjectVersion(config.versionFile);
  const releaseId = toReleaseIdentifier(config.name, version, config.devMarker);
  log(`Packaging ${releaseId}`);

  if (!isInsideProject(cwd, config.outputDir)) {
    throw new Error(
      `Refusing to clean ${config.outputDir}: not a subdirectory of ${cwd}`,
    );
  }
  const outputDir = resolve(cwd, config.outputDir);
  cleanOutputDir(outputDir);
  log(`Removed ${config.outputDir}`);

  log(`Running ${formatCommand(config.buildCommand)}`);
  runner(config.buildCommand, { cwd });

  if (!install) {
    return { releaseId, outputDir };
  }

  const artifact = join(
    config.outputDir,
    findFirstArtifact(outputDir, config.artifactPattern),
  );

  const installCommand = [...config.installCommand, artifact];
  log(`Running ${formatCommand(installCommand)}`);
  runner(installCommand, { cwd });

  log(`Running ${formatCommand(config.repairCommand)}`);
  runner(config.repairCommand, { cwd });

  return { releaseId, outputDir, artifact };
}
