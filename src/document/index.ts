/**
 * Document module - span detection and chunk planning
 */

// Interfaces
export * from './ProtectedSpan';
export * from './ChunkPlanner';

// Implementations
export * from './SpanDetector';
export * from './MarkdownChunkPlanner';
export * from './ChunkPlan';
export * from './ReaderArtifacts';
