/**
 * Assessment Recommender
 *
 * Semantic retrieval over an assessment catalog, grounded explanations, and
 * Mean Recall@K evaluation.
 *
 * @packageDocumentation
 */

// Configuration
export { DEFAULT_CONFIG, resolvePath } from './config/recommender-config.js';
export type { RecommenderConfig } from './config/recommender-config.js';
export { loadConfig, mergeConfig, validateConfig } from './config/loader.js';

// Catalog
export { loadCatalog, parseCatalogCsv, parseCatalogJson } from './catalog/catalog-loader.js';
export { buildFullText, cleanText, toAssessmentRecord } from './catalog/full-text.js';
export type { AssessmentRecord, CatalogIngestionRecord, RetrievalResultDto } from './catalog/types.js';

// Embeddings
export { Embedder } from './models/embedder.js';
export type { EmbeddingProvider } from './models/embedding-provider.js';
export { MODEL_REGISTRY, getModel, getAllModelIds } from './models/model-registry.js';

// Storage
export * from './storage/index.js';

// Retrieval
export * from './retrieval/index.js';

// Recommendation
export { RecommendationEngine } from './recommendation/recommendation-engine.js';
export type { RecommendOptions, RecommendationResult } from './recommendation/recommendation-engine.js';
export { AnthropicExplanationGenerator } from './recommendation/explanation-generator.js';
export type { ExplanationGenerator, ExplanationRequest } from './recommendation/explanation-generator.js';

// Evaluation
export * from './evaluation/index.js';

// HTTP
export { createApp, startServer } from './server/app.js';

// Errors
export * from './utils/errors.js';

export { VERSION } from './version.js';
