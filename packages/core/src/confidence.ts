// Response confidence estimate used to gate automatic sending

const BASE_CONFIDENCE = 0.7;
const SHORT_RESPONSE_CHARS = 50;
const LONG_RESPONSE_CHARS = 300;
const LONG_INBOUND_CHARS = 1000;

export interface ConfidenceInput {
  responseText: string;
  inboundBody: string;
  // Confidence the model reported for its reply, if any
  providerConfidence?: number;
}

export const clampConfidence = (value: number): number =>
  Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;

/**
 * Length heuristic: short replies and long inbound messages lower the score,
 * a substantial reply raises it. A provider-reported confidence can only
 * lower the result.
 */
export function scoreResponse(input: ConfidenceInput): number {
  let score = BASE_CONFIDENCE;

  if (input.responseText.length < SHORT_RESPONSE_CHARS) {
    score -= 0.2;
  } else if (input.responseText.length > LONG_RESPONSE_CHARS) {
    score += 0.1;
  }

  if (input.inboundBody.length > LONG_INBOUND_CHARS) {
    score -= 0.1;
  }

  if (input.providerConfidence !== undefined) {
    score = Math.min(score, input.providerConfidence);
  }

  // Two decimals, so 0.7 + 0.1 compares equal to a 0.8 threshold
  return clampConfidence(Math.round(score * 100) / 100);
}
