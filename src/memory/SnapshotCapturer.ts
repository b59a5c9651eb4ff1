import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { VisibilityState } from '../types/enums.js';
import type { ScrollPosition, ViewportSize } from '../types/structures.js';
import { ContentMemoryError, ErrorCode } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { config, type Clock } from './config.js';
import { normalizeText, pickHashAttributes, resolveIdentity } from './identity.js';
import type { ContentSnapshot, ElementData } from './types.js';

export interface CapturerOptions {
  idAttribute: string;
  containerSelector: string;
  elementSelector?: string;
  now: Clock;
  logger?: Logger;
}

const IGNORED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

const scrollSchema = z.object({ x: z.number().finite(), y: z.number().finite() });
const viewportSchema = z.object({ width: z.number().finite().nonnegative(), height: z.number().finite().nonnegative() });

export class SnapshotCapturer {
  private options: CapturerOptions;
  private log: Logger;

  constructor(options: CapturerOptions) {
    this.options = options;
    this.log = createLogger('SnapshotCapturer', options.logger);
  }

  captureSnapshot(
    bodyMarkup: string,
    scrollPosition: ScrollPosition,
    viewportSize: ViewportSize,
    actionContext = '',
    url?: string
  ): ContentSnapshot {
    const scroll = scrollSchema.safeParse(scrollPosition);
    if (!scroll.success) {
      throw new ContentMemoryError(ErrorCode.INVALID_ARGUMENT, 'scrollPosition must have finite x and y', {
        scrollPosition,
      });
    }
    const viewport = viewportSchema.safeParse(viewportSize);
    if (!viewport.success) {
      throw new ContentMemoryError(ErrorCode.INVALID_ARGUMENT, 'viewportSize must have non-negative width and height', {
        viewportSize,
      });
    }

    const timestamp = this.options.now();
    const elements = this.collectElements(bodyMarkup, timestamp);

    return Object.freeze({
      timestamp,
      elements,
      scrollPosition: Object.freeze({ ...scroll.data }),
      viewportSize: Object.freeze({ ...viewport.data }),
      actionContext,
      ...(url !== undefined ? { url } : {}),
    });
  }

  private collectElements(bodyMarkup: string, timestamp: number): Map<string, Readonly<ElementData>> {
    const elements = new Map<string, Readonly<ElementData>>();
    if (typeof bodyMarkup !== 'string' || bodyMarkup.trim() === '') return elements;

    let candidates: Element[];
    try {
      candidates = isMemoryOutput(bodyMarkup) ? this.memoryCandidates(bodyMarkup) : this.findCandidates(bodyMarkup);
    } catch (err) {
      this.log.warn({ err }, 'Failed to parse markup, capturing empty snapshot');
      return elements;
    }

    for (const el of candidates) {
      const tag = el.tagName.toLowerCase();
      if (IGNORED_TAGS.has(tag)) continue;
      const { id, source } = resolveIdentity(el, this.options.idAttribute);
      // first occurrence in document order wins
      if (elements.has(id)) continue;
      elements.set(id, Object.freeze({
        id,
        tag,
        text: normalizeText(el.textContent),
        html: el.outerHTML,
        attributes: Object.freeze(pickHashAttributes(el)),
        identitySource: source,
        visibilityState: isHidden(el) ? VisibilityState.HIDDEN : VisibilityState.VISIBLE,
        firstSeen: timestamp,
        lastSeen: timestamp,
        viewCount: 1,
      }));
    }

    this.log.debug({ count: elements.size }, 'Captured snapshot');
    return elements;
  }

  private findCandidates(bodyMarkup: string): Element[] {
    const { document } = new JSDOM(bodyMarkup).window;
    if (this.options.elementSelector) {
      return Array.from(document.querySelectorAll(this.options.elementSelector));
    }
    const container = document.querySelector(this.options.containerSelector);
    return container ? Array.from(container.children) : [];
  }

  /**
   * Markup rendered by HTMLGenerator holds exactly the stored elements, so
   * selectors do not apply. It is parsed in template context, which keeps
   * table-level fragments such as <tr> intact.
   */
  private memoryCandidates(bodyMarkup: string): Element[] {
    const template = new JSDOM('').window.document.createElement('template');
    template.innerHTML = bodyMarkup;
    const candidates: Element[] = [];
    const visit = (parent: DocumentFragment) => {
      for (const child of Array.from(parent.children)) {
        if (isTemplate(child) && child.hasAttribute(config.markerAttribute)) {
          visit(child.content);
        } else {
          candidates.push(child);
        }
      }
    };
    visit(template.content);
    return candidates;
  }
}

function isMemoryOutput(markup: string): boolean {
  return markup.trimStart().startsWith(config.memoryRootComment);
}

function isTemplate(el: Element): el is HTMLTemplateElement {
  return el.tagName === 'TEMPLATE';
}

export function isHidden(el: Element): boolean {
  if (el.hasAttribute('hidden')) return true;
  if (el.getAttribute('aria-hidden') === 'true') return true;
  const style = (el.getAttribute('style') ?? '').replace(/\s+/g, '').toLowerCase();
  return style.includes('display:none') || style.includes('visibility:hidden');
}
