export * from "./core/errors.js";
export { PipelineOrchestrator, type PipelineDeps, type PipelineOptions } from "./core/orchestrator.js";
export { PIPELINE_STATES, aggregateStatus, canTransition, isTerminal, nextState, type PipelineState } from "./core/pipeline-state.js";
export { RunStore, makeRunId, type RunSummary } from "./core/run-store.js";
export { buildPhaseEnv } from "./core/phase-env.js";
export { loadConfig, loadRawConfig, DEFAULT_CONFIG_DIR, type LoadedConfig } from "./config/loader.js";
export { normalizeConfig, validateRawConfig } from "./config/validator.js";
export { ServiceRegistry, probePort } from "./registry/service-registry.js";
export { parsePortBinding, bindingsConflict, formatBinding } from "./registry/ports.js";
export { ServiceSupervisor, type StopReport, type SupervisorOptions } from "./services/supervisor.js";
export { DockerRuntime } from "./services/docker-runtime.js";
export type { ContainerRuntime, LaunchContext } from "./services/runtime.js";
export { createProbe, waitUntilReady, tcpCheck, httpCheck, type ProbeAttempt } from "./services/probes.js";
export { BuildIdentityResolver, buildNumber, type IdentitySource } from "./git/identity.js";
export { GitOperations } from "./git/operations.js";
export { PhaseRunner, FILTER_ENV } from "./phases/phase-runner.js";
export { expandCommand, shellQuote } from "./phases/command.js";
export { parseJunitCounts } from "./adapter/junit-xml.js";
export { ResultFinalizer, axiosTransport, webhookBody, statusMarker, type Ack, type ReportTransport } from "./report/finalizer.js";
export { run, type RunOpts, type RunResult } from "./commands/run.js";
export { EXIT, exitCodeFor, type ExitCode } from "./commands/exit-codes.js";
export { createLogger, type Logger } from "./utils/logger.js";
export type * from "./types/config.js";
export type * from "./types/phase.js";
export type * from "./types/run.js";
export type * from "./types/service.js";
