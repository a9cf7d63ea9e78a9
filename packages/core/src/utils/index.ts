export {
  stableHash,
  selectIndex,
  selectDeterministic,
} from "./deterministicSelect.js";
export { foldForMatching } from "./normalizeText.js";
export { formatResultSummary } from "./formatResult.js";
