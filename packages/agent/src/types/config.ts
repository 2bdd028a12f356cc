export type ApprovalMode = 'auto' | 'manual' | 'disabled';

export type RunConfig = {
  readonly approvalMode: ApprovalMode;
  readonly maxIterations: number;
  readonly timeoutPerIterationMs: number;
  readonly allowedTools: ReadonlyArray<string>;
  readonly blockedTools: ReadonlyArray<string>;
  readonly enableTools: boolean;
};
