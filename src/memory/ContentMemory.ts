import { VisibilityState } from '../types/enums.js';
import type { ScrollPosition, ViewportSize } from '../types/structures.js';
import { ContentMemoryError, ErrorCode } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { resolveOptions, type ContentMemoryOptions, type ResolvedOptions } from './config.js';
import { HTMLGenerator } from './HTMLGenerator.js';
import { SnapshotCapturer } from './SnapshotCapturer.js';
import { SnapshotMerger } from './SnapshotMerger.js';
import type {
  ContentSnapshot,
  ElementData,
  MemoryStatistics,
  MergeResult,
  RenderOptions,
} from './types.js';

/**
 * Session-scoped memory of page content across actions.
 *
 * Snapshots are captured before and after each action and merged into a
 * cumulative store that keeps every element ever seen, marking the ones that
 * left the page as removed instead of forgetting them. Entries leave the
 * store only through pruneOldElements, the maxElements cap, reset, or a
 * merge when accumulate is off.
 *
 * All methods are synchronous, so a mutation always completes before any
 * other call on the same instance can observe the store.
 */
export class ContentMemory {
  private store = new Map<string, ElementData>();
  private lastAddedIds = new Set<string>();
  private snapshotsTaken = 0;
  private mergesPerformed = 0;
  private sessionStart: number;
  private lastActionContext?: string;
  private baseMarkup?: string;
  private baseIds = new Set<string>();

  private options: ResolvedOptions;
  private capturer: SnapshotCapturer;
  private merger = new SnapshotMerger();
  private generator: HTMLGenerator;
  private log: Logger;

  constructor(options: ContentMemoryOptions = {}) {
    this.options = resolveOptions(options);
    this.log = createLogger('ContentMemory', this.options.logger);
    this.capturer = new SnapshotCapturer(this.options);
    this.generator = new HTMLGenerator(this.options.accumulator);
    this.sessionStart = this.options.now();
  }

  get size(): number {
    return this.store.size;
  }

  captureSnapshot(
    bodyMarkup: string,
    scrollPosition: ScrollPosition,
    viewportSize: ViewportSize,
    actionContext?: string,
    url?: string
  ): ContentSnapshot {
    const snapshot = this.capturer.captureSnapshot(bodyMarkup, scrollPosition, viewportSize, actionContext, url);
    this.snapshotsTaken++;
    return snapshot;
  }

  mergeSnapshots(before: ContentSnapshot | null | undefined, after: ContentSnapshot): MergeResult {
    const result = this.merger.merge(before, after);
    this.lastAddedIds.clear();
    if (this.options.accumulate) {
      this.accumulate(before, after, result);
    } else {
      // The latest snapshot replaces the memory
      this.store.clear();
      for (const el of after.elements.values()) {
        this.applySighting(el, after.timestamp, after.timestamp);
      }
    }

    this.mergesPerformed++;
    this.lastActionContext = after.actionContext || undefined;
    this.enforceCapacity(after);
    this.log.debug({ summary: result.summary(), total: this.store.size }, 'Merged snapshots');
    return result;
  }

  getCumulativeHtml(includeRemoved = true, options: RenderOptions = {}): string {
    const annotate = options.annotateVisibility ?? true;
    let elements = Array.from(this.store.values());
    if (!includeRemoved) {
      elements = elements.filter((el) => el.visibilityState === VisibilityState.VISIBLE);
    }
    if (options.excludeLastAdded) {
      elements = elements.filter((el) => !this.lastAddedIds.has(el.id));
    }
    if (options.includeBase) {
      elements = elements.filter((el) => !this.baseIds.has(el.id));
      return this.generator.compose(this.baseMarkup, elements, annotate);
    }
    return this.generator.render(elements, annotate);
  }

  getVisibleHtml(): string {
    return this.getCumulativeHtml(false);
  }

  /**
   * Baseline page markup, e.g. the page before the first action. Stored
   * elements whose ids appear in comparisonMarkup (default: the baseline
   * itself) are left out when the baseline is composed in.
   */
  setBaseMarkup(markup: string | undefined, comparisonMarkup: string | undefined = markup): void {
    this.baseMarkup = markup;
    this.baseIds = new Set(
      comparisonMarkup
        ? this.capturer.captureSnapshot(comparisonMarkup, { x: 0, y: 0 }, { width: 0, height: 0 }).elements.keys()
        : []
    );
  }

  getStatistics(): MemoryStatistics {
    const byVisibilityState: Record<VisibilityState, number> = {
      [VisibilityState.VISIBLE]: 0,
      [VisibilityState.REMOVED]: 0,
      [VisibilityState.HIDDEN]: 0,
    };
    for (const el of this.store.values()) {
      byVisibilityState[el.visibilityState]++;
    }
    return {
      totalElements: this.store.size,
      byVisibilityState,
      snapshotsTaken: this.snapshotsTaken,
      mergesPerformed: this.mergesPerformed,
      sessionDurationSeconds: Math.max(0, this.options.now() - this.sessionStart) / 1000,
      lastActionContext: this.lastActionContext,
    };
  }

  getElement(id: string): ElementData | undefined {
    const el = this.store.get(id);
    return el ? { ...el } : undefined;
  }

  getElements(state?: VisibilityState): ElementData[] {
    const out: ElementData[] = [];
    for (const el of this.store.values()) {
      if (state === undefined || el.visibilityState === state) out.push({ ...el });
    }
    return out;
  }

  /**
   * Delete non-visible elements not seen within maxAgeSeconds.
   * Returns the number of deleted elements.
   */
  pruneOldElements(maxAgeSeconds: number): number {
    if (typeof maxAgeSeconds !== 'number' || !Number.isFinite(maxAgeSeconds) || maxAgeSeconds <= 0) {
      throw new ContentMemoryError(ErrorCode.INVALID_ARGUMENT, 'maxAgeSeconds must be a positive number', {
        maxAgeSeconds,
      });
    }
    const cutoff = this.options.now() - maxAgeSeconds * 1000;
    let pruned = 0;
    for (const [id, el] of this.store) {
      if (el.visibilityState === VisibilityState.VISIBLE) continue;
      if (el.lastSeen < cutoff) {
        this.delete(id);
        pruned++;
      }
    }
    this.log.debug({ pruned, total: this.store.size }, 'Pruned old elements');
    return pruned;
  }

  reset(): void {
    this.store.clear();
    this.lastAddedIds.clear();
    this.snapshotsTaken = 0;
    this.mergesPerformed = 0;
    this.lastActionContext = undefined;
    this.baseMarkup = undefined;
    this.baseIds.clear();
    this.sessionStart = this.options.now();
  }

  private accumulate(before: ContentSnapshot | null | undefined, after: ContentSnapshot, result: MergeResult): void {
    // Walk `before` first so elements it introduces keep document order
    if (before) {
      for (const id of before.elements.keys()) {
        const persistent = result.persistentElements.get(id);
        if (persistent) {
          this.applySighting(persistent, before.timestamp, after.timestamp);
          continue;
        }
        const removed = result.removedElements.get(id);
        if (removed) this.applyRemoval(removed, before.timestamp);
      }
    }
    for (const el of result.newElements.values()) {
      this.applySighting(el, after.timestamp, after.timestamp);
    }
  }

  private applySighting(el: Readonly<ElementData>, firstSeen: number, seenAt: number): void {
    const existing = this.store.get(el.id);
    if (!existing) {
      this.store.set(el.id, { ...el, firstSeen, lastSeen: seenAt, viewCount: 1 });
      this.lastAddedIds.add(el.id);
      return;
    }
    if (this.options.mergePolicy === 'latest') {
      existing.tag = el.tag;
      existing.text = el.text;
      existing.html = el.html;
      existing.attributes = el.attributes;
    }
    existing.visibilityState = el.visibilityState;
    existing.lastSeen = Math.max(existing.lastSeen, seenAt);
    existing.viewCount++;
  }

  private applyRemoval(el: Readonly<ElementData>, seenAt: number): void {
    const existing = this.store.get(el.id);
    if (existing) {
      existing.visibilityState = VisibilityState.REMOVED;
      return;
    }
    this.store.set(el.id, {
      ...el,
      firstSeen: seenAt,
      lastSeen: seenAt,
      viewCount: 1,
      visibilityState: VisibilityState.REMOVED,
    });
    this.lastAddedIds.add(el.id);
  }

  /** Elements present in the latest snapshot are never evicted */
  private enforceCapacity(after: ContentSnapshot): void {
    const max = this.options.maxElements;
    if (max === undefined || this.store.size <= max) return;
    const evictable = Array.from(this.store.values())
      .filter((el) => el.visibilityState !== VisibilityState.VISIBLE && !after.elements.has(el.id))
      .sort((a, b) => a.lastSeen - b.lastSeen);
    let evicted = 0;
    for (const el of evictable) {
      if (this.store.size <= max) break;
      this.delete(el.id);
      evicted++;
    }
    if (evicted > 0) {
      this.log.debug({ evicted, max }, 'Evicted elements over capacity');
    }
  }

  private delete(id: string): void {
    this.store.delete(id);
    this.lastAddedIds.delete(id);
  }
}
