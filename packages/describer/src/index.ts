export { createDescriptionGenerator, OpenAIDescriber, VertexGeminiDescriber } from "./llm";
export type {
  DescriptionGenerator,
  DescriptionRequest,
  DescriptionResponse,
  GeneratorConfig,
} from "./llm";
export {
  HTML_TRUNCATION_MARKER,
  buildMultiPagePrompt,
  buildRequestText,
  buildSinglePagePrompt,
  truncateHtml,
} from "./prompts";
export type { MultiPagePromptInput, PagePromptEntry } from "./prompts";
