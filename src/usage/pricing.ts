import type { PricingEntry } from "./types.js";

export const DEFAULT_PRICING_MODEL_ID = "anthropic.claude-3-sonnet-20240229-v1:0";

// USD per 1000 tokens (on-demand, us-east-1).
const BEDROCK_PRICING: ReadonlyArray<readonly [string, PricingEntry]> = [
  [
    "anthropic.claude-3-sonnet-20240229-v1:0",
    { inputPricePerThousandTokens: 0.003, outputPricePerThousandTokens: 0.015 },
  ],
  [
    "anthropic.claude-3-opus-20240229-v1:0",
    { inputPricePerThousandTokens: 0.015, outputPricePerThousandTokens: 0.075 },
  ],
  [
    "anthropic.claude-3-haiku-20240307-v1:0",
    { inputPricePerThousandTokens: 0.00025, outputPricePerThousandTokens: 0.00125 },
  ],
  [
    "anthropic.claude-instant-v1",
    { inputPricePerThousandTokens: 0.0008, outputPricePerThousandTokens: 0.0024 },
  ],
];

export class PricingTable {
  private readonly entries: ReadonlyMap<string, PricingEntry>;
  private readonly fallback: PricingEntry;

  constructor(
    entries: Iterable<readonly [string, PricingEntry]>,
    readonly defaultModelId: string,
  ) {
    const map = new Map<string, PricingEntry>();
    for (const [modelId, entry] of entries) {
      map.set(modelId, Object.freeze({ ...entry }));
    }
    const fallback = map.get(defaultModelId);
    if (!fallback) {
      throw new Error(`Default pricing model "${defaultModelId}" is not in the table`);
    }
    this.entries = map;
    this.fallback = fallback;
  }

  has(modelId: string): boolean {
    return this.entries.has(modelId);
  }

  /** Entry for the model, or the default tier for unrecognized ids. */
  resolve(modelId: string): PricingEntry {
    return this.entries.get(modelId) ?? this.fallback;
  }

  cost(modelId: string, inputTokens: number, outputTokens: number): number {
    const pricing = this.resolve(modelId);
    return (
      (inputTokens / 1000) * pricing.inputPricePerThousandTokens +
      (outputTokens / 1000) * pricing.outputPricePerThousandTokens
    );
  }

  withOverrides(overrides: Readonly<Record<string, PricingEntry>>): PricingTable {
    return new PricingTable(
      [...this.entries, ...Object.entries(overrides)],
      this.defaultModelId,
    );
  }
}

export const DEFAULT_PRICING_TABLE = new PricingTable(BEDROCK_PRICING, DEFAULT_PRICING_MODEL_ID);
