// Public API

export {
  cleanOutputDir,
  findFirstArtifact,
  listArtifacts,
} from "./artifact.js";
export {
  CONFIG_FILE,
  type ConfigFile,
  isInsideProject,
  type LoadConfigOptions,
  loadConfig,
  type PackagingConfig,
} from "./config.js";
export {
  type PackagingOptions,
  type PackagingResult,
  runPackaging,
} from "./driver.js";
export { createProgram, type ProgramOptions } from "./program.js";
export {
  DEFAULT_DEV_MARKER,
  type DevMarker,
  isStableMarker,
  readProjectVersion,
  rewriteDevMarker,
  toReleaseIdentifier,
} from "./release.js";
export {
  type CommandRunner,
  execRunner,
  formatCommand,
  type RunOptions,
} from "./runner.js";
