export { ContentMemory } from './ContentMemory.js';
export { ContentMemoryPool } from './ContentMemoryPool.js';
export { SnapshotCapturer, isHidden } from './SnapshotCapturer.js';
export { SnapshotMerger } from './SnapshotMerger.js';
export { HTMLGenerator, defaultAccumulator } from './HTMLGenerator.js';
export { resolveIdentity, contentHash, normalizeText } from './identity.js';
export { config, contentMemoryOptionsSchema, resolveOptions } from './config.js';
export type { ContentMemoryOptions, Clock, MemoryAccumulator, MergePolicy } from './config.js';
export type { CapturerOptions } from './SnapshotCapturer.js';
export type { ResolvedIdentity } from './identity.js';
export type {
  ElementData,
  ContentSnapshot,
  MergeResult,
  MemoryStatistics,
  RenderOptions,
} from './types.js';
