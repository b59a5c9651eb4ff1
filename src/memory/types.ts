import type { IdentitySource, VisibilityState } from '../types/enums.js';
import type { ScrollPosition, ViewportSize } from '../types/structures.js';

/** One tracked element */
export interface ElementData {
  id: string;
  tag: string;
  text: string;
  html: string;
  attributes: Readonly<Record<string, string>>;
  identitySource: IdentitySource;
  visibilityState: VisibilityState;
  firstSeen: number;
  lastSeen: number;
  viewCount: number;
}

/** Immutable capture of the elements present at one instant */
export interface ContentSnapshot {
  readonly timestamp: number;
  readonly elements: ReadonlyMap<string, Readonly<ElementData>>;
  readonly scrollPosition: Readonly<ScrollPosition>;
  readonly viewportSize: Readonly<ViewportSize>;
  readonly actionContext: string;
  readonly url?: string;
}

export interface MergeResult {
  readonly newElements: ReadonlyMap<string, Readonly<ElementData>>;
  readonly removedElements: ReadonlyMap<string, Readonly<ElementData>>;
  readonly persistentElements: ReadonlyMap<string, Readonly<ElementData>>;
  /** Persistent ids whose markup differs between the two snapshots */
  readonly changedElements: ReadonlyMap<string, Readonly<ElementData>>;
  summary(): string;
}

export interface MemoryStatistics {
  totalElements: number;
  byVisibilityState: Record<VisibilityState, number>;
  snapshotsTaken: number;
  mergesPerformed: number;
  sessionDurationSeconds: number;
  lastActionContext?: string;
}

export interface RenderOptions {
  /** Wrap non-visible elements in a visibility marker (default true) */
  annotateVisibility?: boolean;
  /** Skip the elements inserted by the latest merge */
  excludeLastAdded?: boolean;
  /** Prefix the baseline markup and skip elements it already contains */
  includeBase?: boolean;
}
