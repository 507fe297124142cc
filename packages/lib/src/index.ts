export type {
  ContainerPlatform,
  OptionalServiceName,
  ServiceDescriptor,
  GeneratedPaths,
  EnvironmentConfig,
  ComposeConfig,
  ComposeErrorCode,
  RunOptions,
  RunResult,
  CommandRunner,
  ComposeRunOptions,
  ComposeRunResult,
  Prompter,
  PreflightCode,
  PreflightIssue,
  PreflightResult,
  GenerateResult,
  RuntimeContext,
} from "./types.ts";

export { SynapseEnvError, commandFailed } from "./errors.ts";
export type { SynapseEnvErrorCode } from "./errors.ts";

export { createLogger } from "./logger.ts";
export type { LogLevel, Logger } from "./logger.ts";

export { CONFIG_FILE_NAME, DEFAULTS, buildEnvironmentConfig, loadEnvironmentConfig } from "./config.ts";
export { parseEnvContent, readEnvFile, parseListValue, parseBooleanValue } from "./env.ts";
export { resolveWorkDir, resolveProjectName, resolveGeneratedPaths, containerName, volumeName } from "./paths.ts";

export { runCommand, which } from "./exec.ts";
export { classifyError, buildComposeArgv, runCompose } from "./compose-runner.ts";
export {
  composePull,
  composeUp,
  composeStop,
  composeDown,
  restartContainer,
  execInContainer,
  volumeExists,
  removeVolume,
  runEphemeral,
} from "./compose.ts";

export { detectRuntime, resolveComposeBin, resolveComposeConfig, isStandaloneCompose } from "./runtime.ts";
export type { ProgramLookup } from "./runtime.ts";
export { checkRequiredPrograms, runPreflightChecks, ensurePrerequisites } from "./preflight.ts";
export { SERVICE_UID, fixPermissions, fixAdditionalVolumes } from "./permissions.ts";

export {
  MANAGED_MARKER,
  parsePath,
  setAt,
  deleteAt,
  appendAt,
  applyPatches,
  parseYamlDocument,
  markManaged,
  stringifyYamlDocument,
  stringifyManagedYaml,
  patchYamlText,
  patchYamlFile,
} from "./yaml.ts";
export type { PatchPath, PatchValue, YamlPatch } from "./yaml.ts";

export { serviceLinks, formatLinks } from "./links.ts";
export type { ServiceLink } from "./links.ts";

export type { ComposeSpec, ComposeService } from "./compose-spec.ts";
export type { GeneratorContext, GeneratorName } from "./generators/common.ts";
export { NAMED_VOLUMES, assertCompatibleFeatures, buildComposeSpec, stringifyComposeSpec, generateCompose } from "./generators/compose.ts";
export { buildNginxServers, renderNginxConfig, generateNginx } from "./generators/nginx.ts";
export { buildElementConfig, generateElement } from "./generators/element.ts";
export { buildHookshotConfig, buildHookshotRegistration, generateHookshot } from "./generators/hookshot.ts";
export { synapsePatches, generateSynapse } from "./generators/synapse.ts";
export { masPatches, MAS_HOMESERVER_PATCHES, generateMas } from "./generators/mas.ts";
