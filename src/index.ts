export * from './document';
export * from './preservation';
export * from './pipeline';

export * from './config/ConfigLoader';
export * from './logging/ConfigurableLoggerFactory';
export * from './logging/LogContext';
export * from './util/errors';
export * from './util/SchemaAssert';
export * from './util/WorkerPool';
export * from './util/escapeRegExp';
