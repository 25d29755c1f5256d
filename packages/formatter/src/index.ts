export * from './ingest/response-ingester.js';
export * from './extract/key-value-grammar.js';
export * from './extract/strategies.js';
export * from './extract/product-extractor.js';
export * from './extract/catalog-records.js';
export * from './activity/activity-analyzer.js';
export * from './references/reference-collector.js';
export * from './summary/summary-composer.js';
export * from './assembler/response-assembler.js';
