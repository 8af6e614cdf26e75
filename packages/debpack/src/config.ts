/**
 * Project configuration, read from an optional debpack.yaml.
 *
 * Every key has a default, so a project without the file is packaged
 * with stdeb exactly as `setup.py bdist_deb` would be:
 *
 *   name: hyperspy
 *   version_file: hyperspy/Release.py
 *   output_dir: deb_dist
 *   artifact_pattern: "*.deb"
 *   build_command: [python3, setup.py, --command-packages=stdeb.command, bdist_deb]
 *   install_command: [sudo, dpkg, -i]
 *   repair_command: [sudo, apt-get, install, -f]
 */

import { existsSync, readFileSync } from "node:fs";
import {
  basename,
  isAbsolute,
  join,
  relative,
  resolve,
  sep,
} from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod/v4";
import {
  DEFAULT_DEV_MARKER,
  type DevMarker,
  isStableMarker,
} from "./release.js";

export const CONFIG_FILE = "debpack.yaml";

const DEFAULT_PYTHON = "python3";

const CommandSchema = z.array(z.string().min(1)).min(1);

const ConfigFileSchema = z.object({
  name: z.string().min(1).optional(),
  version_file: z.string().min(1).optional(),
  dev_marker: z
    .object({
      from: z.string().min(1),
      to: z.string().min(1),
    })
    .refine(isStableMarker, {
      message: "dev_marker.to must not recreate dev_marker.from when rewritten",
    })
    .optional(),
  output_dir: z.string().min(1).default("deb_dist"),
  artifact_pattern: z.string().min(1).default("*.deb"),
  build_command: CommandSchema.optional(),
  install_command: CommandSchema.default(["sudo", "dpkg", "-i"]),
  repair_command: CommandSchema.default(["sudo", "apt-get", "install", "-f"]),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface PackagingConfig {
  name: string;
  /** Absolute path of the version metadata file */
  versionFile: string;
  devMarker: DevMarker;
  /** Relative to the project directory unless absolute */
  outputDir: string;
  artifactPattern: string;
  buildCommand: string[];
  installCommand: string[];
  repairCommand: string[];
}

export interface LoadConfigOptions {
  /** Explicit config file; defaults to debpack.yaml in the project */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function getPython(env: NodeJS.ProcessEnv): string {
  return env.DEBPACK_PYTHON || DEFAULT_PYTHON;
}

/** Whether `outputDir` resolves to a strict subdirectory of `root`. */
export function isInsideProject(root: string, outputDir: string): boolean {
  const rel = relative(root, resolve(root, outputDir));
  return (
    rel !== "" &&
    rel !== ".." &&
    !rel.startsWith(`..${sep}`) &&
    !isAbsolute(rel)
  );
}

function readConfigFile(path: string, root: string): ConfigFile {
  const raw: unknown = parseYaml(readFileSync(path, "utf-8"));
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid config ${path}: ${z.prettifyError(result.error)}`);
  }
  if (!isInsideProject(root, result.data.output_dir)) {
    throw new Error(
      `Invalid config ${path}: output_dir must be a subdirectory of ${root}, got "${result.data.output_dir}"`,
    );
  }
  return result.data;
}

/**
 * Resolve the packaging configuration for a project directory.
 * A missing debpack.yaml yields the defaults; an explicit configPath must exist.
 */
export function loadConfig(
  projectDir: string,
  options: LoadConfigOptions = {},
): PackagingConfig {
  const root = resolve(projectDir);
  const env = options.env ?? process.env;

  let file: ConfigFile;
  if (options.configPath) {
    const configPath = resolve(root, options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    file = readConfigFile(configPath, root);
  } else {
    const configPath = join(root, CONFIG_FILE);
    file = existsSync(configPath)
      ? readConfigFile(configPath, root)
      : ConfigFileSchema.parse({});
  }

  const name = file.name ?? basename(root);

  return {
    name,
    versionFile: resolve(root, file.version_file ?? join(name, "Release.py")),
    devMarker: file.dev_marker ?? DEFAULT_DEV_MARKER,
    outputDir: file.output_dir,
    artifactPattern: file.artifact_pattern,
    buildCommand: file.build_command ?? [
      getPython(env),
      "setup.py",
      "--command-packages=stdeb.command",
      "bdist_deb",
    ],
    installCommand: file.install_command,
    repairCommand: file.repair_command,
  };
}
