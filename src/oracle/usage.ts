export type TokenUsage = {
  input_tokens: number;
  output_tokens: number;
};

export type UsageSnapshot = {
  calls: number;
  input_tokens: number;
  output_tokens: number;
  by_model: Record<string, { calls: number; input_tokens: number; output_tokens: number }>;
};

/**
 * Process-wide token accounting. Diagnostic only: nothing in the pipeline branches on it.
 */
export class UsageMeter {
  private calls = 0;
  private inputTokens = 0;
  private outputTokens = 0;
  private byModel = new Map<string, { calls: number; input_tokens: number; output_tokens: number }>();

  record(model: string, usage: TokenUsage): void {
    this.calls += 1;
    this.inputTokens += usage.input_tokens;
    this.outputTokens += usage.output_tokens;
    const prev = this.byModel.get(model) ?? { calls: 0, input_tokens: 0, output_tokens: 0 };
    this.byModel.set(model, {
      calls: prev.calls + 1,
      input_tokens: prev.input_tokens + usage.input_tokens,
      output_tokens: prev.output_tokens + usage.output_tokens
    });
  }

  snapshot(): UsageSnapshot {
    const by_model: UsageSnapshot["by_model"] = {};
    for (const [model, stats] of this.byModel) by_model[model] = { ...stats };
    return { calls: this.calls, input_tokens: this.inputTokens, output_tokens: this.outputTokens, by_model };
  }

  reset(): void {
    this.calls = 0;
    this.inputTokens = 0;
    this.outputTokens = 0;
    this.byModel.clear();
  }
}

export const processUsage = new UsageMeter();
