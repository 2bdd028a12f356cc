export type ToolSchema = {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
};
