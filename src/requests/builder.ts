/**
 * Request builder.
 *
 * Turns each routed record into exactly one provider-neutral inference
 * request: rendered system instruction and prompt, the response schema, and
 * the generation parameters from the pipeline configuration. The output
 * token cap is passed through as configured and never raised here.
 */

import type { PipelineConfig } from "../config/pipeline/schema.js";
import type { RoutedRecord } from "../routing/router.js";
import { buildPromptContext } from "../prompts/context.js";
import { renderPrompt } from "../prompts/renderer.js";
import type { ParsedTemplate } from "../prompts/template.js";
import {
  PromptTemplateLoader,
  CELL_EVALUATION_TEMPLATE,
  SYSTEM_INSTRUCTION_TEMPLATE,
} from "../prompts/loader.js";
import { createNullLogger, type Logger } from "../logging/logger.js";
import { resolveTextContext, type TextSource } from "./text-context.js";
import { buildRecordEvaluationSchema } from "./response-schema.js";

/**
 * One record's evaluation request.
 */
export interface InferenceRequest {
  readonly recordId: string;
  readonly model: string;
  readonly systemInstruction: string;
  readonly prompt: string;
  readonly responseSchema: Readonly<Record<string, unknown>>;
  readonly maxOutputTokens: number;
  readonly temperature: number;
  /** Cells routed to the record, in prompt order */
  readonly cellIds: readonly string[];
  readonly textSource: TextSource;
}

export interface PreparationStats {
  requests: number;
  withAbstract: number;
  excerptFallback: number;
  limitedMetadata: number;
  cellsRequested: number;
  /** Category tag → number of requests */
  requestsByTag: Record<string, number>;
}

export interface BuildResult {
  requests: InferenceRequest[];
  stats: PreparationStats;
}

export interface RequestBuilderOptions {
  /** Template source; defaults to the bundled prompts directory */
  templates?: PromptTemplateLoader;
  logger?: Logger;
}

export class RequestBuilder {
  private readonly config: Readonly<PipelineConfig>;
  private readonly systemTemplate: ParsedTemplate;
  private readonly promptTemplate: ParsedTemplate;
  private readonly responseSchema: Readonly<Record<string, unknown>>;
  private readonly logger: Logger;

  constructor(config: Readonly<PipelineConfig>, options: RequestBuilderOptions = {}) {
    const templates = options.templates ?? new PromptTemplateLoader();
    this.config = config;
    this.systemTemplate = templates.load(SYSTEM_INSTRUCTION_TEMPLATE);
    this.promptTemplate = templates.load(CELL_EVALUATION_TEMPLATE);
    this.responseSchema = buildRecordEvaluationSchema(config.scoring);
    this.logger = options.logger ?? createNullLogger();
  }

  build(routed: RoutedRecord): InferenceRequest {
    const { record, cells } = routed;
    const textContext = resolveTextContext(record, this.config.textContext);
    const context = buildPromptContext({
      record,
      cells,
      textContext,
      topicTagPrefix: this.config.matrix.topicTagPrefix,
      scoring: this.config.scoring,
    });

    return Object.freeze({
      recordId: record.recordId,
      model: this.config.generation.model,
      systemInstruction: renderPrompt(this.systemTemplate, context, { strict: false }),
      prompt: renderPrompt(this.promptTemplate, context),
      responseSchema: this.responseSchema,
      maxOutputTokens: this.config.generation.maxOutputTokens,
      temperature: this.config.generation.temperature,
      cellIds: Object.freeze(cells.map((c) => c.cellId)),
      textSource: textContext.source,
    });
  }

  /**
   * Build one request per routed record, in input order.
   */
  buildAll(routed: readonly RoutedRecord[]): BuildResult {
    const requests: InferenceRequest[] = [];
    const stats: PreparationStats = {
      requests: 0,
      withAbstract: 0,
      excerptFallback: 0,
      limitedMetadata: 0,
      cellsRequested: 0,
      requestsByTag: {},
    };

    for (const entry of routed) {
      const request = this.build(entry);
      requests.push(request);

      stats.requests++;
      stats.cellsRequested += request.cellIds.length;
      const tag = entry.record.categoryTag;
      stats.requestsByTag[tag] = (stats.requestsByTag[tag] ?? 0) + 1;
      switch (request.textSource) {
        case "abstract":
          stats.withAbstract++;
          break;
        case "excerpt":
          stats.excerptFallback++;
          break;
        case "limited":
          stats.limitedMetadata++;
          this.logger.debug("Limited metadata for record", { recordId: request.recordId });
          break;
      }
    }

    this.logger.info("Requests built", {
      requests: stats.requests,
      withAbstract: stats.withAbstract,
      excerptFallback: stats.excerptFallback,
      limitedMetadata: stats.limitedMetadata,
      cellsRequested: stats.cellsRequested,
      maxOutputTokens: this.config.generation.maxOutputTokens,
    });

    return { requests, stats };
  }
}
