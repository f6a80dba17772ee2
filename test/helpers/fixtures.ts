import { Writable } from "node:stream";
import { vi } from "vitest";
import type { ModelUsage } from "../../src/usage/types.js";

export const SONNET = "anthropic.claude-3-sonnet-20240229-v1:0";
export const OPUS = "anthropic.claude-3-opus-20240229-v1:0";
export const HAIKU = "anthropic.claude-3-haiku-20240307-v1:0";

export function mockLogger() {
  return {
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
    child: vi.fn().mockReturnThis(), fatal: vi.fn(),
  } as any;
}

export function captureStream(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

export function makeUsage(overrides: Partial<ModelUsage> = {}): ModelUsage {
  return {
    invocationCount: 100,
    inputTokenCount: 50_000,
    outputTokenCount: 20_000,
    totalLatencySeconds: 150,
    errorCount: 0,
    ...overrides,
  };
}
