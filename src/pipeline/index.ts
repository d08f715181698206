export * from './TextTransformer';
export * from './OutputCleanup';
export * from './ChunkTransformRunner';
export * from './DocumentPipeline';
