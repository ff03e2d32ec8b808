import type { HarvesterConfig, RenderedDocument, TabContent, TabExtraction } from "../types";
import { getErrorMessage } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";

export type TabSettings = HarvesterConfig["tabs"];

const TIMED_OUT = Symbol("timed-out");

function raceTimeout<T>(task: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(TIMED_OUT), ms);
    task.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Drops blank lines, region headings and the tab labels themselves from panel text
 */
export function cleanPanelText(raw: string, ignoredLines: readonly string[]): string {
  if (!raw) return "";
  const ignored = new Set(ignoredLines);
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !ignored.has(line))
    .join("\n")
    .trim();
}

/**
 * Activates each configured tab in order and captures the content region once it settles.
 * A tab that is missing, fails or never settles yields whatever text was there, possibly "".
 */
export class TabContentExtractor {
  private readonly logger: QueuedLogger;

  constructor(private readonly settings: TabSettings, logger?: QueuedLogger) {
    this.logger = logger ?? createLogger("Tabs");
  }

  async extractTabs(
    document: RenderedDocument,
    tabLabels: readonly string[] = this.settings.labels,
    objectId: string = "",
  ): Promise<TabExtraction> {
    const tabs: TabContent = {};
    const timedOut: string[] = [];
    const missing: string[] = [];
    const ignoredLines = [...this.settings.ignoredLines, ...tabLabels];
    let previousText = "";

    for (const label of tabLabels) {
      tabs[label] = "";

      try {
        const activated = await document.activateTab(label, this.settings.clickTimeoutMs);
        if (!activated) {
          missing.push(label);
          this.logger.debug(`[${objectId}] Tab "${label}" not present`);
          continue;
        }

        const settled = await raceTimeout(
          document.waitForQuiescence({
            quietWindowMs: this.settings.quietWindowMs,
            maxWaitMs: this.settings.maxWaitMs,
          }),
          this.settings.maxWaitMs + this.settings.graceMs,
        );
        if (settled !== true) {
          timedOut.push(label);
          this.logger.warn(`[${objectId}] Tab "${label}" did not settle within ${this.settings.maxWaitMs}ms - keeping what was rendered`);
        }

        const text = cleanPanelText(await document.regionText(), ignoredLines);
        // Same text as the previous tab means the panel never switched
        tabs[label] = text !== "" && text === previousText ? "" : text;
        previousText = text;
      } catch (error) {
        this.logger.warn(`[${objectId}] Tab "${label}" failed: ${getErrorMessage(error)}`);
      }
    }

    return { tabs, timedOut, missing };
  }
}
