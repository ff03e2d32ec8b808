import puppeteer, { type Browser, type Page, type PuppeteerLaunchOptions } from "puppeteer-core";
import type { HarvesterConfig, PageRenderer, QuiescenceOptions, RenderedDocument } from "../types";
import { resolveBrowserExecutable } from "../utils/dependency-check";
import { NavigationError, getErrorMessage } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";
import { sleep } from "../utils/retry";

/**
 * Launch options for the harvest browser. Signal handling is left to the CLI
 * so an interrupt can still flush the checkpoint before the browser goes away.
 */
export function browserLaunchOptions(config: HarvesterConfig, executablePath: string): PuppeteerLaunchOptions {
  return {
    executablePath,
    headless: config.browser.headless,
    handleSIGINT: false,
    handleSIGTERM: false,
    handleSIGHUP: false,
    args: [
      "--no-sandbox",
      "--disable-setuid-sandbox",
      "--disable-dev-shm-usage",
      "--disable-blink-features=AutomationControlled",
      "--disable-gpu",
    ],
  };
}

/**
 * Live object page. Every query runs inside the page; the tab content region
 * is the closest section/div around the heading named by `regionHeading`.
 */
class PuppeteerDocument implements RenderedDocument {
  private closed = false;

  constructor(
    private readonly page: Page,
    readonly url: string,
    private readonly regionHeading: string,
  ) {}

  async heading(): Promise<string> {
    const title = await this.page.evaluate(() => {
      const main = document.querySelector("main") || document.body;
      const h1 = main.querySelector("h1");
      return h1 ? (h1.textContent || "").trim() : document.title || "";
    });
    return title.trim();
  }

  async imageSources(selector: string): Promise<string[]> {
    if (!selector.trim()) return [];
    return this.page.evaluate((sel) => {
      const urls = Array.from(document.querySelectorAll(sel))
        .filter((el): el is HTMLImageElement => el instanceof HTMLImageElement)
        .map((img) => img.currentSrc || img.src || "")
        .filter((url) => url.startsWith("http"));
      return Array.from(new Set(urls));
    }, selector);
  }

  async activateTab(label: string, timeoutMs: number): Promise<boolean> {
    const click = this.page.evaluate((text) => {
      const candidates = Array.from(
        document.querySelectorAll<HTMLElement>('[role="tab"], button, a, li, span, div'),
      ).filter((el) => (el.textContent || "").trim() === text);
      // Deepest match is the element that actually carries the click handler
      const target = candidates.find((el) => !candidates.some((other) => other !== el && el.contains(other)));
      if (!target) return false;
      target.scrollIntoView({ block: "center" });
      target.click();
      return true;
    }, label);

    return new Promise<boolean>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new Error(`Clicking tab "${label}" timed out after ${timeoutMs}ms`)),
        timeoutMs,
      );
      click.then(
        (clicked) => {
          clearTimeout(timer);
          resolve(clicked);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }

  async waitForQuiescence(options: QuiescenceOptions): Promise<boolean> {
    return this.page.evaluate(
      (heading, quietWindowMs, maxWaitMs): Promise<boolean> => {
        const headings = Array.from(document.querySelectorAll("h1, h2, h3"));
        const match = headings.find((h) => (h.textContent || "").includes(heading));
        const region = (match && (match.closest("section, div") || match.parentElement)) || document.body;

        return new Promise((resolve) => {
          let quietTimer = setTimeout(finish, quietWindowMs, true);
          const maxTimer = setTimeout(finish, maxWaitMs, false);
          const observer = new MutationObserver(() => {
            clearTimeout(quietTimer);
            quietTimer = setTimeout(finish, quietWindowMs, true);
          });

          function finish(stable: boolean) {
            observer.disconnect();
            clearTimeout(quietTimer);
            clearTimeout(maxTimer);
            resolve(stable);
          }

          observer.observe(region, { childList: true, subtree: true, characterData: true, attributes: true });
        });
      },
      this.regionHeading,
      options.quietWindowMs,
      options.maxWaitMs,
    );
  }

  async regionText(): Promise<string> {
    const text = await this.page.evaluate((heading) => {
      const headings = Array.from(document.querySelectorAll<HTMLElement>("h1, h2, h3"));
      const match = headings.find((h) => (h.textContent || "").includes(heading));
      if (!match) return "";
      const container = match.closest<HTMLElement>("section, div") || match.parentElement;
      return container ? container.innerText : "";
    }, this.regionHeading);
    return text.trim();
  }

  async snapshot(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.page.close();
  }
}

/**
 * One browser for the whole run, one page per object.
 */
export class PuppeteerRenderer implements PageRenderer {
  private browser: Browser | null = null;
  private readonly logger: QueuedLogger;

  constructor(private readonly config: HarvesterConfig, logger?: QueuedLogger) {
    this.logger = logger ?? createLogger("Renderer");
  }

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.connected) {
      return this.browser;
    }

    const executablePath = resolveBrowserExecutable(this.config);
    if (!executablePath) {
      throw new Error("No browser executable configured: set browser.executablePath or PUPPETEER_EXECUTABLE_PATH");
    }

    if (this.browser) {
      this.logger.warn("Browser disconnected - relaunching");
    }

    this.browser = await puppeteer.launch(browserLaunchOptions(this.config, executablePath));
    this.logger.info(`✓ Browser launched (${this.config.browser.headless ? "headless" : "headed"})`);
    return this.browser;
  }

  private async createConfiguredPage(): Promise<Page> {
    const browser = await this.ensureBrowser();
    const page = await browser.newPage();
    const { viewport, userAgent } = this.config.browser;
    await page.setViewport({
      width: viewport.width,
      height: viewport.height,
      deviceScaleFactor: viewport.deviceScaleFactor ?? 1,
    });
    await page.setUserAgent(userAgent);
    await page.setExtraHTTPHeaders({ "Accept-Language": "en-US,en;q=0.9" });
    return page;
  }

  async open(url: string, objectId: string): Promise<RenderedDocument> {
    const page = await this.createConfiguredPage();
    const { timeoutMs, waitUntil, settleMs } = this.config.navigation;

    try {
      const response = await page.goto(url, { waitUntil, timeout: timeoutMs });
      const httpStatus = response?.status() ?? 0;
      if (httpStatus >= 400) {
        throw new NavigationError(objectId, `HTTP ${httpStatus} for ${url}`, httpStatus);
      }
      if (settleMs > 0) {
        await sleep(settleMs);
      }
    } catch (error) {
      await page.close().catch((closeError: unknown) => {
        this.logger.warn(`[${objectId}] Failed to close page after navigation error: ${getErrorMessage(closeError)}`);
      });
      if (error instanceof NavigationError) throw error;
      throw new NavigationError(objectId, getErrorMessage(error));
    }

    return new PuppeteerDocument(page, url, this.config.tabs.regionHeading);
  }

  async close(): Promise<void> {
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close();
    }
  }
}
