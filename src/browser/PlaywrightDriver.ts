import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type {
  BrowserLauncher,
  DrivenBrowser,
  LaunchOptions,
  PageDriver,
  PageOptions,
  WaitUntil,
} from './BrowserDriver';

export const DEFAULT_CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
];

class PlaywrightPage implements PageDriver {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async goto(url: string, waitUntil: WaitUntil, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil, timeout: timeoutMs });
  }

  url(): string {
    return this.page.url();
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.click(selector, { timeout: timeoutMs });
  }

  async fill(selector: string, text: string, timeoutMs: number): Promise<void> {
    await this.page.fill(selector, text, { timeout: timeoutMs });
  }

  async press(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async textContent(selector: string): Promise<string | null> {
    const element = await this.page.$(selector);
    return element ? element.textContent() : null;
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    const element = await this.page.$(selector);
    return element ? element.getAttribute(name) : null;
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
  }

  scrollHeight(): Promise<number> {
    return this.page.evaluate<number>('document.body.scrollHeight');
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async saveStorageState(path: string): Promise<void> {
    await this.context.storageState({ path });
  }
}

class PlaywrightBrowser implements DrivenBrowser {
  constructor(private readonly browser: Browser) {}

  async newPage(options: PageOptions): Promise<PageDriver> {
    const context = await this.browser.newContext({
      viewport: options.viewport,
      userAgent: options.userAgent,
      ...(options.storageStatePath && { storageState: options.storageStatePath }),
    });
    const page = await context.newPage();
    page.setDefaultTimeout(options.defaultTimeoutMs);
    return new PlaywrightPage(context, page);
  }

  isConnected(): boolean {
    return this.browser.isConnected();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Launches Chromium through playwright-core. The browser binary must already
 * be installed on the host (playwright-core never downloads one).
 */
export const launchChromium: BrowserLauncher = async (options: LaunchOptions) => {
  const browser = await chromium.launch({
    headless: options.headless,
    args: options.args,
  });
  return new PlaywrightBrowser(browser);
};
