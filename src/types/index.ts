/**
 * Shared types for the hook engine
 */

// Hook Events
export const HOOK_EVENT_KINDS = [
  'ToolBefore',
  'ToolAfter',
  'SessionStart',
  'SessionEnd',
  'AgentCreated',
  'AgentDestroyed',
  'SlashCommand',
] as const;

export type HookEventKind = (typeof HOOK_EVENT_KINDS)[number];

/**
 * Events that carry a subject name (tool or slash command) and honor `toolFilter`
 */
export const SCOPED_EVENT_KINDS: ReadonlySet<HookEventKind> = new Set<HookEventKind>([
  'ToolBefore',
  'ToolAfter',
  'SlashCommand',
]);

/**
 * Events whose hooks can veto the guarded host action
 */
export const BLOCKING_EVENT_KINDS: ReadonlySet<HookEventKind> = new Set<HookEventKind>([
  'ToolBefore',
  'SlashCommand',
]);

// Conditions
export type SizeOperator = '<' | '<=' | '>' | '>=';

export interface FileExtensionCondition {
  type: 'FileExtension';
  ext: string;
}

export interface PathPrefixCondition {
  type: 'PathPrefix';
  prefix: string;
}

export interface FileSizeLimitCondition {
  type: 'FileSizeLimit';
  op: SizeOperator;
  bytes: number;
}

export interface PathGlobCondition {
  type: 'PathGlob';
  pattern: string;
}

export type Condition =
  | FileExtensionCondition
  | PathPrefixCondition
  | FileSizeLimitCondition
  | PathGlobCondition;

// Hook Definition
export interface HookDefinition {
  /** Unique key within a registry */
  readonly name: string;
  readonly eventKind: HookEventKind;
  /** Tool (or slash command) names; empty matches any */
  readonly toolFilter: readonly string[];
  /** Passed verbatim to the shell */
  readonly commandLine: string;
  readonly enabled: boolean;
  /** Attach the child to the controlling terminal */
  readonly interactive: boolean;
  /** A failing before-hook only warns instead of blocking */
  readonly advisory: boolean;
  readonly timeoutSeconds: number;
  readonly conditions: readonly Condition[];
  readonly dependsOn?: string;
  /** Literal substring of the command text */
  readonly matchPattern?: string;
  readonly matchRegex?: RegExp;
  readonly description?: string;
}

// Execution
export interface ExecutionContext {
  eventKind: HookEventKind;
  toolName: string | null;
  filePath: string | null;
  /** The command the host is about to run (bash tool) */
  commandText: string | null;
  sessionId: string;
  workingDirectory: string;
  /** Variables overlaid on the inherited environment; HOOK_NAME is added per hook */
  environmentOverrides: Record<string, string>;
}

/**
 * What the host supplies for one event; the dispatcher derives the ExecutionContext from it
 */
export interface EventContext {
  sessionId: string;
  workingDirectory: string;
  filePath?: string | null;
  commandText?: string | null;
  /** Extra variables for every hook of this dispatch */
  environment?: Record<string, string>;
}

export type ExecutionOutcome = 'Success' | 'Warning' | 'Skipped' | 'Aborted' | 'TimedOut';

export interface ExecutionResult {
  hookName: string;
  /** null when the child was killed or never started */
  exitCode: number | null;
  timedOut: boolean;
  durationMillis: number;
  stdoutTail: string;
  stderrTail: string;
  outcome: ExecutionOutcome;
  /** Why the outcome is what it is, when the exit code alone does not say */
  detail?: string;
}

export type Verdict = 'Proceed' | 'Block';

export interface DispatchOutcome {
  eventKind: HookEventKind;
  results: ExecutionResult[];
  verdict: Verdict;
  /** The result that made the verdict Block */
  blockedBy?: ExecutionResult;
  cancelled: boolean;
  /** Set when ordering failed and nothing was executed */
  error?: string;
  totalDurationMillis: number;
}

// Engine settings
export interface EngineSettings {
  /** Bytes of stdout/stderr kept per hook */
  outputTailBytes: number;
  /** How long to wait for streams to close after a kill */
  killGraceMillis: number;
  debug: boolean;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  outputTailBytes: 64 * 1024,
  killGraceMillis: 2000,
  debug: false,
};
