/**
 * Prompt template system.
 *
 * Provides typed, validated prompt template loading and rendering
 * for record evaluation requests. Templates use `{{variable}}` placeholders
 * and `{{#if …}}…{{/if}}` conditional blocks that are validated against
 * a typed context derived from the domain model.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import {
 *   PromptTemplateLoader,
 *   buildPromptContext,
 *   renderPrompt,
 *   CELL_EVALUATION_TEMPLATE,
 * } from "./prompts/index.js";
 *
 * // 1. Load a template once (bundled prompts/ by default)
 * const loader = new PromptTemplateLoader();
 * const template = loader.load(CELL_EVALUATION_TEMPLATE);
 *
 * // 2. Build a context for each routed record
 * for (const { record, cells } of routed) {
 *   const context = buildPromptContext({
 *     record,
 *     cells,
 *     textContext: resolveTextContext(record, config.textContext),
 *     topicTagPrefix: config.matrix.topicTagPrefix,
 *     scoring: config.scoring,
 *   });
 *
 *   // 3. Render: conditionals are resolved, then variables substituted
 *   const prompt = renderPrompt(template, context);
 * }
 * ```
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONDITIONAL SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Templates support three forms of conditionals:
 *
 *   Truthy:     {{#if variable}}body{{/if}}
 *   Equality:   {{#if variable == "value"}}body{{/if}}
 *   Inequality: {{#if variable != "value"}}body{{/if}}
 *
 * See conditional.ts for full documentation.
 */

// Context
export {
  buildPromptContext,
  formatAuthors,
  formatSubjects,
  formatCategoryLabel,
  formatCellList,
  isUnset,
  type PromptContext,
  type PromptContextMap,
  type PromptContextInput,
  type PromptVariable,
} from "./context.js";

// Template parsing
export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  getValidVariables,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

// Rendering
export {
  renderPrompt,
  PromptRenderError,
  UnusedVariableError,
  type RenderOptions,
} from "./renderer.js";

// Loader
export {
  PromptTemplateLoader,
  TemplateLoadError,
  DEFAULT_PROMPTS_DIR,
  CELL_EVALUATION_TEMPLATE,
  SYSTEM_INSTRUCTION_TEMPLATE,
} from "./loader.js";

// Conditionals
export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  getEnumValues,
  ConditionalParseError,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";
