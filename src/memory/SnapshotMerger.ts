import type { ContentSnapshot, ElementData, MergeResult } from './types.js';

type ElementMap = Map<string, Readonly<ElementData>>;

class SnapshotMergeResult implements MergeResult {
  constructor(
    readonly newElements: ElementMap,
    readonly removedElements: ElementMap,
    readonly persistentElements: ElementMap,
    readonly changedElements: ElementMap
  ) {}

  summary(): string {
    const base = `${this.newElements.size} new, ${this.removedElements.size} removed, ${this.persistentElements.size} persistent`;
    return this.changedElements.size > 0 ? `${base} (${this.changedElements.size} changed)` : base;
  }
}

/**
 * Classifies elements of two snapshots by id. Identity is authoritative: an id
 * present in both is persistent even when its content changed in place.
 */
export class SnapshotMerger {
  merge(before: ContentSnapshot | null | undefined, after: ContentSnapshot): MergeResult {
    const newElements: ElementMap = new Map();
    const removedElements: ElementMap = new Map();
    const persistentElements: ElementMap = new Map();
    const changedElements: ElementMap = new Map();
    const previous = before?.elements ?? new Map<string, Readonly<ElementData>>();

    for (const [id, el] of after.elements) {
      const prevEl = previous.get(id);
      if (!prevEl) {
        newElements.set(id, el);
        continue;
      }
      persistentElements.set(id, el);
      if (prevEl.html !== el.html) changedElements.set(id, el);
    }

    for (const [id, el] of previous) {
      if (!after.elements.has(id)) removedElements.set(id, el);
    }

    return new SnapshotMergeResult(newElements, removedElements, persistentElements, changedElements);
  }
}
