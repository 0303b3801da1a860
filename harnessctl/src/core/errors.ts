/**
 * Error hierarchy for the harness.
 *
 * Identity and provisioning errors abort a run; phase errors are recorded per
 * phase; finalization errors are reported on their own axis.
 */
export class HarnessError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "HarnessError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Config file missing, unparseable or failing schema validation. */
export class ConfigError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/** Duplicate service names or host bindings in the registry. */
export class RegistryError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "REGISTRY_ERROR", context);
    this.name = "RegistryError";
  }
}

export class ProvisionError extends HarnessError {
  public readonly serviceName: string;

  constructor(serviceName: string, cause: unknown) {
    super(`Service '${serviceName}' failed to become ready: ${errorMessage(cause)}`, "PROVISION_FAILED", {
      serviceName,
    });
    this.name = "ProvisionError";
    this.serviceName = serviceName;
    this.cause = cause;
  }
}

/** No correlation key can be formed; never retried. */
export class IdentityError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "IDENTITY_UNAVAILABLE", context);
    this.name = "IdentityError";
  }
}

export class PhaseExecutionError extends HarnessError {
  constructor(phase: string, command: string, exitCode: number | null, detail?: string) {
    const suffix = detail ? `: ${detail}` : "";
    super(`Phase '${phase}' command exited with ${exitCode ?? "signal"}${suffix}`, "PHASE_FAILED", {
      phase,
      command,
      exitCode,
    });
    this.name = "PhaseExecutionError";
  }
}

export class CoverageMissingError extends HarnessError {
  constructor(phase: string, artifact: string) {
    super(`Phase '${phase}' succeeded but produced no coverage artifact at ${artifact}`, "COVERAGE_MISSING", {
      phase,
      artifact,
    });
    this.name = "CoverageMissingError";
  }
}

export class FinalizationError extends HarnessError {
  public readonly attempts: number;
  public readonly transient: boolean;

  constructor(message: string, attempts: number, transient: boolean, cause?: unknown) {
    super(message, "FINALIZATION_FAILED", { attempts, transient });
    this.name = "FinalizationError";
    this.attempts = attempts;
    this.transient = transient;
    if (cause !== undefined) this.cause = cause;
  }
}

export class StateTransitionError extends HarnessError {
  constructor(from: string, to: string) {
    super(`Illegal transition ${from} -> ${to}`, "ILLEGAL_TRANSITION", { from, to });
    this.name = "StateTransitionError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
