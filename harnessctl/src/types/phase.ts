/** Test phase types. */
export type LintSettings = {
  rcfile: string;
  /** Parallelism degree; defaults to the host CPU count. */
  jobs?: number;
};

export type PhaseSpec = {
  readonly name: string;
  readonly commands: readonly string[];
  /** Passed through to the test command untouched. */
  readonly filter?: string;
  readonly producesCoverage: boolean;
  readonly coverageArtifact?: string;
  /** JUnit XML report written by the phase, if any. */
  readonly junitReport?: string;
  readonly blocking: boolean;
  readonly workdir?: string;
  readonly env: Readonly<Record<string, string>>;
  readonly lint?: LintSettings;
  readonly timeoutMs?: number;
};

export type PhaseExitStatus = "success" | "failure" | "skipped";

export type TestCounts = {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
};

export type PhaseResult = {
  readonly phase: string;
  readonly exitStatus: PhaseExitStatus;
  readonly failedCommand?: string;
  readonly exitCode?: number | null;
  readonly error?: { code: string; message: string };
  readonly coverageArtifact?: string;
  readonly tests?: TestCounts;
  readonly logRef: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
};
