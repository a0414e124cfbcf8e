// services/extractDate/smartEventExtractorSelector.ts
import { extractRules } from "./ruleEventExtractor.js";
import { extractLLM, type LlmExtractInput } from "./llmEventExtractor.js";
import type { ResolvedExtraction } from "../../types/events.js";
import { logger } from "../../lib/logger.js";

export async function extractSmart(
  input: LlmExtractInput & {
    llmFirst?: boolean;         // strategy toggle; false = offline, rules only
  }
): Promise<ResolvedExtraction> {
  if (input.llmFirst === false) {
    return extractRules(input);
  }

  const llm = await extractLLM(input);
  if (!llm.degraded && llm.event) return { ...llm, event: llm.event };

  logger.info("falling back to rule-based extraction", { warnings: llm.warnings });
  const rules = extractRules(input);
  return { event: rules.event, degraded: true, warnings: [...llm.warnings, ...rules.warnings] };
}
