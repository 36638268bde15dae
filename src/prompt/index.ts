export {
  MAX_PROMPT_ATTEMPTS,
  createPrompter,
  createReadlineAsk,
  parseBumpAnswer,
  parseConfirmAnswer,
  type Ask,
  type LineReader,
} from "./prompt";
