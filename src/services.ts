import type { AppConfig } from './lib/config.js';
import { OllamaGateway, type ModelGateway } from './lib/model-gateway.js';
import { FileDocumentExtractor, type DocumentExtractor } from './lib/document-extractor.js';
import { LocalFileService, type FileService } from './lib/file-service.js';
import { TerminalUIService, type UIService } from './lib/ui-service.js';
import { createResponseExtractor } from './lib/response-extractor.js';
import { DataAnalyzer } from './agents/analyzer.js';
import { PageGenerator } from './agents/page-generator.js';
import { PortfolioPipeline } from './agents/pipeline.js';
import type { PipelineEmitter } from './agents/types.js';

export interface ServiceOverrides {
  gateway?: ModelGateway;
  extractor?: DocumentExtractor;
  files?: FileService;
  ui?: UIService;
  emit?: PipelineEmitter;
}

export interface Services {
  gateway: ModelGateway;
  extractor: DocumentExtractor;
  analyzer: DataAnalyzer;
  generator: PageGenerator;
  files: FileService;
  ui: UIService;
  pipeline: PortfolioPipeline;
}

/**
 * Wires every collaborator in dependency order: gateway first, then the two
 * model stages that share it, then the pipeline. Overrides replace single
 * collaborators (tests, alternative front ends).
 */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const gateway = overrides.gateway ?? new OllamaGateway({
    host: config.ollamaHost,
    settleMs: config.evictSettleMs,
  });
  const extractor = overrides.extractor ?? new FileDocumentExtractor();
  const files = overrides.files ?? new LocalFileService(config.outputDir);
  const ui = overrides.ui ?? new TerminalUIService();

  const responses = createResponseExtractor(config.reasoningDelimiters);

  const analyzer = new DataAnalyzer(gateway, {
    model: config.models.brain,
    temperature: config.analysisTemperature,
    contextWindow: config.contextWindow,
    maxTokens: config.maxTokens,
    extractStructured: responses.extractStructured,
    debug: config.debugMode,
  });

  const generator = new PageGenerator(gateway, {
    model: config.models.coder,
    temperature: config.generationTemperature,
    contextWindow: config.contextWindow,
    maxTokens: config.maxTokens,
    sourcePreviewChars: config.sourcePreviewChars,
    debug: config.debugMode,
  });

  const pipeline = new PortfolioPipeline({
    extractor,
    analyzer,
    generator,
    files,
    ui,
    emit: overrides.emit,
  });

  return { gateway, extractor, analyzer, generator, files, ui, pipeline };
}
