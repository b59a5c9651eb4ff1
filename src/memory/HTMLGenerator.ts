import { VisibilityState } from '../types/enums.js';
import { config, type MemoryAccumulator } from './config.js';
import type { ElementData } from './types.js';

const SEPARATOR = '\n';

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export const defaultAccumulator: MemoryAccumulator = (base, fragments) => {
  if (base === undefined || base === '') return fragments.join(SEPARATOR);
  return [base, ...fragments].join(SEPARATOR);
};

/**
 * Renders element sets back into markup in the order given.
 *
 * Annotated output starts with the memory root comment and wraps non-visible
 * elements in a marker <template>. SnapshotCapturer recognises the comment
 * and reads the elements back whatever selectors it was configured with.
 */
export class HTMLGenerator {
  constructor(private accumulator: MemoryAccumulator = defaultAccumulator) {}

  render(elements: Iterable<Readonly<ElementData>>, annotateVisibility: boolean): string {
    const fragments = this.fragments(elements, annotateVisibility);
    if (!annotateVisibility || fragments.length === 0) return fragments.join(SEPARATOR);
    return [config.memoryRootComment, ...fragments].join(SEPARATOR);
  }

  /** Renders the elements and hands them to the accumulator together with the baseline */
  compose(base: string | undefined, elements: Iterable<Readonly<ElementData>>, annotateVisibility: boolean): string {
    return this.accumulator(base, this.fragments(elements, annotateVisibility));
  }

  private fragments(elements: Iterable<Readonly<ElementData>>, annotateVisibility: boolean): string[] {
    const out: string[] = [];
    for (const el of elements) {
      out.push(annotateVisibility ? this.annotate(el) : el.html);
    }
    return out;
  }

  private annotate(el: Readonly<ElementData>): string {
    if (el.visibilityState === VisibilityState.VISIBLE) return el.html;
    return `<template ${config.markerAttribute}="${el.visibilityState}" ${config.markerIdAttribute}="${escapeAttribute(el.id)}">${el.html}</template>`;
  }
}
