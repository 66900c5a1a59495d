import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { resolve } from 'path';

interface UsageEntry {
  ts: string;
  provider: string;
  model: string;
  input: number;
  output: number;
  costUsd: number;
}

// Prices per million tokens [input, output]
const PRICES: Record<string, [number, number]> = {
  'grok-4-1-fast-reasoning':     [0.20, 0.50],
  'grok-4-1-fast-non-reasoning': [0.20, 0.50],
  'grok-2-vision-1212':          [2, 10],
};

export function estimateCost(model: string, inputTokens: number, outputTokens: number): number {
  const prices = PRICES[model];
  if (!prices) return 0;
  return (inputTokens / 1_000_000) * prices[0] + (outputTokens / 1_000_000) * prices[1];
}

export type UsageLogger = (provider: string, model: string, inputTokens: number, outputTokens: number) => void;

/** Appends one JSON line per model call to `<logDir>/<yyyy-mm-dd>.jsonl`. */
export function createUsageLogger(logDir: string): UsageLogger {
  return (provider, model, inputTokens, outputTokens) => {
    try {
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      const entry: UsageEntry = {
        ts: new Date().toISOString(),
        provider,
        model,
        input: inputTokens,
        output: outputTokens,
        costUsd: estimateCost(model, inputTokens, outputTokens),
      };

      const date = entry.ts.slice(0, 10);
      appendFileSync(resolve(logDir, `${date}.jsonl`), JSON.stringify(entry) + '\n');
    } catch (error) {
      console.warn('[llm] usage log write failed:', error instanceof Error ? error.message : error);
    }
  };
}
