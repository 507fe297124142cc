export type SynapseEnvErrorCode =
  | "missing_programs"
  | "no_runtime"
  | "incompatible_features"
  | "command_failed"
  | "generate_failed"
  | "service_disabled";

/**
 * Error raised by library operations. `exitStatus` is the status the CLI
 * should exit with; for a failed external command it is the command's own.
 */
export class SynapseEnvError extends Error {
  readonly code: SynapseEnvErrorCode;
  readonly exitStatus: number;

  constructor(code: SynapseEnvErrorCode, message: string, exitStatus: number = 1) {
    super(message);
    this.name = "SynapseEnvError";
    this.code = code;
    this.exitStatus = exitStatus;
  }
}

/** `reason` is a classification of the failure, such as `image_pull_failed`. */
export function commandFailed(argv: string[], exitCode: number, stderr: string = "", reason?: string): SynapseEnvError {
  const detail = stderr.trim();
  const status = `${argv.join(" ")} exited with status ${exitCode}`;
  const message = reason ? `${status} (${reason})` : status;
  return new SynapseEnvError(
    "command_failed",
    detail ? `${message}: ${detail}` : message,
    exitCode === 0 ? 1 : exitCode
  );
}
