import type { ParsedMessage, SessionSource, TokenUsage } from "@shared/schema";

export interface SourcePricing {
  inputPer1M: number;
  outputPer1M: number;
  // null when the source's usage is not billed for that component.
  cacheCreationPer1M: number | null;
  cacheReadPer1M: number | null;
}

const MILLION = 1_000_000;
const BYTES_PER_TOKEN = 4;

// Static USD estimates; not kept in sync with any billing API.
export const SOURCE_PRICING: Record<SessionSource, SourcePricing> = {
  codex: { inputPer1M: 3, outputPer1M: 15, cacheCreationPer1M: null, cacheReadPer1M: null },
  claude: { inputPer1M: 3, outputPer1M: 15, cacheCreationPer1M: 3.75, cacheReadPer1M: 0.3 },
};

const ESTIMATE_INPUT_ROLES = new Set(["user", "developer"]);

const componentCost = (tokens: number, per1M: number | null): number => {
  if (per1M === null || !Number.isFinite(tokens) || tokens <= 0) return 0;
  return (tokens * per1M) / MILLION;
};

export const computeCost = (source: SessionSource, tokens: TokenUsage): number => {
  const pricing = SOURCE_PRICING[source];

  return (
    componentCost(tokens.input, pricing.inputPer1M) +
    componentCost(tokens.output, pricing.outputPer1M) +
    componentCost(tokens.cacheCreation, pricing.cacheCreationPer1M) +
    componentCost(tokens.cacheRead, pricing.cacheReadPer1M)
  );
};

/**
 * Rough usage for transcripts that never reported token counts: four UTF-8 bytes per
 * token, user and developer text as input, everything else as output.
 */
export const estimateTokensFromMessages = (messages: ParsedMessage[]): TokenUsage => {
  let inputBytes = 0;
  let outputBytes = 0;

  for (const message of messages) {
    const bytes = Buffer.byteLength(message.content, "utf8");
    if (ESTIMATE_INPUT_ROLES.has(message.role)) {
      inputBytes += bytes;
    } else {
      outputBytes += bytes;
    }
  }

  const input = Math.floor(inputBytes / BYTES_PER_TOKEN);
  const output = Math.floor(outputBytes / BYTES_PER_TOKEN);

  return {
    input,
    output,
    cacheCreation: 0,
    cacheRead: 0,
    reasoning: 0,
    total: input + output,
  };
};
