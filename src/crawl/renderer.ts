import { AppConfig } from "../config";
import { ChallengeTimeoutError } from "../core/errors";
import { Logger } from "../observability";
import { Renderer, RenderOptions } from "./types";

const DEFAULT_VIEWPORT = { width: 1280, height: 720 };

// Evaluated inside the page; true once no known interstitial challenge is showing.
const CHALLENGE_CLEARED = `(() => {
  const title = (document.title || "").toLowerCase();
  const blockedTitle = ["just a moment", "attention required", "checking your browser", "please wait"].some((t) => title.includes(t));
  const challengeNode = document.querySelector("#challenge-form, #challenge-running, #cf-challenge-running, .cf-browser-verification, #px-captcha");
  return !blockedTitle && !challengeNode && document.readyState !== "loading";
})()`;

/** The parts of a playwright page the renderer drives. */
export interface RenderPage {
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<unknown>;
  waitForFunction(expression: string, arg: undefined, options: { timeout: number; polling: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  url(): string;
  content(): Promise<string>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newContext(options: {
    viewport: { width: number; height: number };
    userAgent: string;
    locale: string;
    extraHTTPHeaders: Record<string, string>;
  }): Promise<RenderContext>;
  close(): Promise<void>;
}

export interface RendererDeps {
  launch?: () => Promise<RenderBrowser>;
  clock?: () => number;
}

async function launchChromium(): Promise<RenderBrowser> {
  const { chromium } = await import("playwright");
  return chromium.launch({
    headless: true,
    args: ["--disable-blink-features=AutomationControlled"],
  });
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

/**
 * Headless chromium, launched on first use and reused until `close()`.
 * Navigation, the challenge wait and the selector wait share one `timeoutMs` budget.
 */
export class PlaywrightRenderer implements Renderer {
  private browser: RenderBrowser | undefined;
  private readonly launch: () => Promise<RenderBrowser>;
  private readonly clock: () => number;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    deps: RendererDeps = {},
  ) {
    this.launch = deps.launch ?? launchChromium;
    this.clock = deps.clock ?? Date.now;
  }

  async render(url: string, options: RenderOptions): Promise<string> {
    const browser = await this.getBrowser();
    const deadline = this.clock() + options.timeoutMs;
    const remaining = (): number => {
      const left = deadline - this.clock();
      if (left <= 0) {
        throw new ChallengeTimeoutError(url, options.timeoutMs);
      }
      return left;
    };

    let context: RenderContext | undefined;
    try {
      context = await browser.newContext({
        viewport: DEFAULT_VIEWPORT,
        userAgent: this.config.userAgent,
        locale: "en-US",
        extraHTTPHeaders: {
          "Accept-Language": this.config.acceptLanguage,
        },
      });
      const page = await context.newPage();
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: remaining() });
      try {
        await page.waitForFunction(CHALLENGE_CLEARED, undefined, { timeout: remaining(), polling: 500 });
        if (options.waitForSelector) {
          await page.waitForSelector(options.waitForSelector, { timeout: remaining() });
        }
      } catch (error) {
        if (isTimeout(error)) {
          throw new ChallengeTimeoutError(url, options.timeoutMs);
        }
        throw error;
      }
      this.logger.debug("render_page_ready", { pageUrl: url, finalUrl: page.url() });
      return await page.content();
    } finally {
      await context?.close();
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = undefined;
    }
  }

  private async getBrowser(): Promise<RenderBrowser> {
    if (!this.browser) {
      this.browser = await this.launch();
      this.logger.info("render_browser_launched");
    }
    return this.browser;
  }
}
