import type { DescriptionTier } from "@shared/schema";
import { DocumentSnapshot } from "../render/document-snapshot";
import type { FallbackDescription, HarvesterConfig } from "../types";
import { getErrorMessage } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";

export type DescriptionSettings = HarvesterConfig["description"];

export interface DescriptionCriteria {
  settings: DescriptionSettings;
  boilerplate: RegExp[];
}

/**
 * One fallback tier: returns its candidate text, or null when it has none.
 */
export interface DescriptionStrategy {
  tier: Exclude<DescriptionTier, "none">;
  find(snapshot: DocumentSnapshot, criteria: DescriptionCriteria): string | null;
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function isLongEnough(text: string, criteria: DescriptionCriteria): boolean {
  return text.length >= criteria.settings.minChars;
}

/**
 * Rejects site-wide copy: cookie notices, navigation, the catalog's generic meta text.
 */
export function looksDescriptive(text: string, criteria: DescriptionCriteria): boolean {
  return isLongEnough(text, criteria) && !criteria.boilerplate.some((pattern) => pattern.test(text));
}

/**
 * Longest candidate; equal lengths keep the first in document order.
 */
function longest(candidates: string[]): string | null {
  let best: string | null = null;
  for (const candidate of candidates) {
    if (best === null || candidate.length > best.length) {
      best = candidate;
    }
  }
  return best;
}

export const frameworkContainerStrategy: DescriptionStrategy = {
  tier: "framework-container",
  find(snapshot, criteria) {
    const { containerSelector, wrapperClass, ancestorDepth } = criteria.settings;
    const match = snapshot
      .select(containerSelector)
      .find(
        (el) =>
          el.text.length > 0 &&
          el.ancestorClasses.slice(0, ancestorDepth).some((classes) => classes.includes(wrapperClass)),
      );
    return match && isLongEnough(match.text, criteria) ? match.text : null;
  },
};

export const descriptiveSpanStrategy: DescriptionStrategy = {
  tier: "descriptive-span",
  find(snapshot, criteria) {
    const candidates = snapshot
      .select(criteria.settings.spanSelector)
      .map((el) => el.text)
      .filter((text) => wordCount(text) >= criteria.settings.minWords && looksDescriptive(text, criteria));
    return longest(candidates);
  },
};

export const metaDescriptionStrategy: DescriptionStrategy = {
  tier: "meta-description",
  find(snapshot, criteria) {
    const content = snapshot.meta("name", "description");
    return content && looksDescriptive(content, criteria) ? content : null;
  },
};

export const ogDescriptionStrategy: DescriptionStrategy = {
  tier: "og-description",
  find(snapshot, criteria) {
    const content = snapshot.meta("property", "og:description");
    return content && looksDescriptive(content, criteria) ? content : null;
  },
};

export const longestParagraphStrategy: DescriptionStrategy = {
  tier: "longest-paragraph",
  find(snapshot, criteria) {
    const candidates = snapshot
      .select("p")
      .map((el) => el.text)
      .filter((text) => looksDescriptive(text, criteria));
    return longest(candidates);
  },
};

export const DEFAULT_STRATEGIES: readonly DescriptionStrategy[] = [
  frameworkContainerStrategy,
  descriptiveSpanStrategy,
  metaDescriptionStrategy,
  ogDescriptionStrategy,
  longestParagraphStrategy,
];

export const NO_DESCRIPTION: FallbackDescription = { text: "", tier: "none" };

/**
 * Walks the strategies in priority order and returns the first accepted candidate.
 */
export class DescriptionResolver {
  private readonly criteria: DescriptionCriteria;
  private readonly logger: QueuedLogger;

  constructor(
    settings: DescriptionSettings,
    private readonly strategies: readonly DescriptionStrategy[] = DEFAULT_STRATEGIES,
    logger?: QueuedLogger,
  ) {
    this.criteria = {
      settings,
      boilerplate: settings.boilerplatePatterns.map((pattern) => new RegExp(pattern, "i")),
    };
    this.logger = logger ?? createLogger("Description");
  }

  resolve(snapshot: DocumentSnapshot): FallbackDescription {
    for (const strategy of this.strategies) {
      try {
        const text = strategy.find(snapshot, this.criteria);
        if (text) {
          return { text, tier: strategy.tier };
        }
      } catch (error) {
        this.logger.warn(`Description tier "${strategy.tier}" failed: ${getErrorMessage(error)}`);
      }
    }
    return { ...NO_DESCRIPTION };
  }

  resolveHtml(html: string): FallbackDescription {
    return this.resolve(DocumentSnapshot.fromHtml(html));
  }
}
