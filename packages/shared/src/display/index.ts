export {
  NO_TOP_CARD,
  SEED_PROMPT,
  COLOR_PROMPT,
  PROMPT_COLORS,
  actionPrompt,
  formatEvent,
  formatOpening,
  formatOutcome,
} from "./format";
