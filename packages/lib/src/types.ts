/** Supported container runtime platforms. */
export type ContainerPlatform = "docker" | "podman";

/** Optional services that can be switched on and off in config.env. */
export type OptionalServiceName =
  | "adminer"
  | "elementweb"
  | "mas"
  | "hookshot"
  | "synapseadmin"
  | "mailhog";

/** Enabled flag, image reference and virtual host of one optional service. */
export type ServiceDescriptor = {
  readonly enabled: boolean;
  readonly image: string;
  readonly host: string;
};

/** Paths of every file and directory the generators own. */
export type GeneratedPaths = {
  readonly composeFile: string;
  readonly nginxConfigFile: string;
  readonly elementConfigFile: string;
  readonly masConfigFile: string;
  readonly synapseData: string;
  readonly synapseConfigFile: string;
  readonly synapseGeneratedLogConfigFile: string;
  readonly synapseLogConfigFile: string;
  readonly hookshotData: string;
  readonly hookshotConfigFile: string;
  readonly hookshotRegistrationFile: string;
  readonly hookshotPasskeyFile: string;
};

/** Immutable settings for one invocation, loaded from config.env. */
export type EnvironmentConfig = {
  /** Directory holding config.env and every generated file. */
  readonly workDir: string;
  /** Base name of workDir; prefixes container and volume names. */
  readonly project: string;
  readonly configFile: string;
  /** Undefined when config.env does not name one; detected at run time. */
  readonly containerRuntime: ContainerPlatform | undefined;
  readonly nginxImage: string;
  readonly ingressPort: string;
  readonly listenPort: string;
  readonly serverName: string;
  readonly synapseHost: string;
  readonly synapseImage: string;
  readonly synapseEnablePresence: boolean;
  readonly synapseAdditionalVolumes: readonly string[];
  readonly postgresImage: string;
  readonly redisImage: string;
  readonly hookshotEncryption: boolean;
  readonly overwriteWithoutAsking: boolean;
  readonly services: Readonly<Record<OptionalServiceName, ServiceDescriptor>>;
  readonly paths: GeneratedPaths;
};

/** Resolved compose command parts. */
export type ComposeConfig = {
  bin: string;
  /** Empty for standalone binaries such as podman-compose. */
  subcommand: string;
  composeFile: string;
  cwd: string;
};

export type ComposeErrorCode =
  | "daemon_unreachable"
  | "image_pull_failed"
  | "invalid_compose"
  | "permission_denied"
  | "unknown";

export type RunOptions = {
  cwd?: string;
  /** Inherit the terminal instead of capturing output. */
  stream?: boolean;
  timeoutMs?: number;
  env?: Record<string, string | undefined>;
};

export type RunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/** Runs an external program. Injected so tests never spawn real processes. */
export type CommandRunner = (argv: string[], options?: RunOptions) => Promise<RunResult>;

export type ComposeRunOptions = {
  bin: string;
  subcommand?: string;
  composeFile: string;
  cwd?: string;
  timeoutMs?: number;
  stream?: boolean;
  retries?: number;
  env?: Record<string, string | undefined>;
  runner?: CommandRunner;
};

export type ComposeRunResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  code: ComposeErrorCode;
};

/** Asks the operator a question and returns the raw answer. */
export type Prompter = (question: string) => Promise<string>;

/** Stable typed codes for preflight check outcomes. */
export type PreflightCode = "missing_programs" | "no_runtime";

/** A single typed preflight check outcome. */
export type PreflightIssue = {
  code: PreflightCode;
  message: string;
  detail?: string;
  meta?: {
    missing?: string[];
  };
};

/** Aggregate result from all preflight checks. */
export type PreflightResult = {
  ok: boolean;
  issues: PreflightIssue[];
};

/** Outcome of one generator run. */
export type GenerateResult = {
  generator: string;
  status: "written" | "skipped" | "disabled";
  files: string[];
};

/** Everything needed to issue container-runtime commands for one run. */
export type RuntimeContext = {
  platform: ContainerPlatform;
  compose: ComposeConfig;
  runner: CommandRunner;
};
