export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

/** Hard cap on RFP characters sent to the model. Bounds token cost per call. */
export const MAX_RFP_TEXT_CHARS = 4000;

export const EXECUTIVE_SUMMARY_SYSTEM_PROMPT = "You are a proposal writer.";

/** First MAX_RFP_TEXT_CHARS characters, counted by code point. */
export function truncateRfpText(text: string, max = MAX_RFP_TEXT_CHARS): string {
  if (text.length <= max) return text;

  let out = "";
  let count = 0;
  for (const ch of text) {
    if (count === max) break;
    out += ch;
    count++;
  }
  return out;
}

export function buildExecutiveSummaryPrompt(rfpText: string): ChatMessage[] {
  const user = `You are a government proposal writer. Using the RFP text below, write a high-level executive summary that could open a proposal responding to it.

RFP TEXT:
${rfpText}`;

  return [
    { role: "system", content: EXECUTIVE_SUMMARY_SYSTEM_PROMPT },
    { role: "user", content: user },
  ];
}
