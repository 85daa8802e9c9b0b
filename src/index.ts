export { Command } from "./core/command.js";
export {
  parseDefinitions,
  parseDoubleHyphenArgs,
  parseFirstArg,
  parseLastArg,
  parseLastOptionIndex,
  parseMops,
  parseOptions,
} from "./core/parsers.js";
export {
  DEFINITION_SEPARATOR,
  DOUBLE_HYPHEN,
  SINGLE_HYPHEN,
  expandShortOption,
  getDefinitionParts,
  isDefinitionOption,
  isDoubleHyphen,
  isLongOption,
  isMopsOption,
  isOptionToken,
  isShortOption,
  isSingleHyphen,
} from "./core/tokens.js";
export type { DefinitionParts } from "./core/tokens.js";
export { expandHome, parentOf, withFileName } from "./foundation/paths.js";
export { renderCommand, renderJson, renderText } from "./pipeline/finalize/render.js";
export type { CommandSnapshot, OutputFormat } from "./types.js";
