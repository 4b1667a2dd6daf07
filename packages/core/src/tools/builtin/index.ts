/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ModelClient } from '../../core/modelClient.js';
import { RegistryConfigurationError } from '../../utils/errors.js';
import { ToolRegistry, loadToolManifest } from '../toolRegistry.js';
import type { ToolHandler } from '../tools.js';
import { arxivSummarizer } from './arxivSummarizer.js';
import { createNewsFetcher } from './newsFetcher.js';
import { createQaEngine } from './qaEngine.js';
import { createSentimentAnalyzer } from './sentimentAnalyzer.js';
import { wikipediaSearch } from './wikipediaSearch.js';

export interface BuiltinToolOptions {
  model?: ModelClient;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  newsApiKey?: string;
  manifestPath?: string;
}

/** Registry holding every manifest tool that has a built-in handler. */
export function createBuiltinToolRegistry(options: BuiltinToolOptions = {}): ToolRegistry {
  const handlers: Record<string, ToolHandler> = {
    wikipedia_search: wikipediaSearch,
    arxiv_summarizer: arxivSummarizer,
    news_fetcher: createNewsFetcher(options.newsApiKey),
    sentiment_analyzer: createSentimentAnalyzer(),
    qa_engine: createQaEngine(options.model, options.modelTimeoutMs ?? 30_000),
  };

  const registry = new ToolRegistry({ timeoutMs: options.toolTimeoutMs });
  for (const descriptor of loadToolManifest(options.manifestPath)) {
    const handler = handlers[descriptor.name];
    if (!handler) {
      throw new RegistryConfigurationError(`No built-in handler for manifest tool '${descriptor.name}'`);
    }
    registry.register(descriptor, handler);
  }
  return registry;
}

export { wikipediaSearch, arxivSummarizer, createNewsFetcher, createQaEngine, createSentimentAnalyzer };
