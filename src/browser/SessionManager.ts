import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../utils/logger';
import type { RequestGate } from '../limits/RequestGate';
import { systemClock, type Clock } from '../limits/RateLimiter';
import { Semaphore } from '../limits/Semaphore';
import { SessionUnavailableError } from '../types/errors';
import type {
  BrowserLauncher,
  DrivenBrowser,
  PageDriver,
  PageOptions,
  Viewport,
  WaitUntil,
} from './BrowserDriver';
import { DEFAULT_CHROMIUM_ARGS } from './PlaywrightDriver';

export enum SessionState {
  UNSTARTED = 'unstarted',
  STARTED = 'started',
  CLOSED = 'closed',
}

export interface SessionManagerOptions {
  headless: boolean;
  sessionStatePath: string;
  defaultTimeoutMs: number;
  scrollPauseMs?: number; // default 1500
  maxScrollIterations?: number; // default 50
  settleDelayMs?: number; // pause after each navigation (default 1000)
  screenshotDir?: string; // default ./debug
  userAgent?: string;
  viewport?: Viewport;
  launchArgs?: string[];
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Owns one driven browser and its page.
 *
 * Lifecycle is UNSTARTED -> STARTED -> CLOSED. Primitives report a missing or
 * non-interactable element as false/null and only throw
 * SessionUnavailableError when the browser itself is unusable. Calls against
 * one manager run one at a time, in submission order.
 */
export class BrowserSessionManager {
  private readonly launcher: BrowserLauncher;
  private readonly gate: RequestGate;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly options: Required<Omit<SessionManagerOptions, 'userAgent' | 'viewport' | 'launchArgs'>> & {
    userAgent: string;
    viewport: Viewport;
    launchArgs: string[];
  };
  private readonly opLock = new Semaphore(1);
  private state: SessionState = SessionState.UNSTARTED;
  private browser?: DrivenBrowser;
  private page?: PageDriver;
  private restored = false;

  constructor(
    launcher: BrowserLauncher,
    gate: RequestGate,
    logger: Logger,
    options: SessionManagerOptions,
    clock: Clock = systemClock
  ) {
    this.launcher = launcher;
    this.gate = gate;
    this.logger = logger;
    this.clock = clock;
    this.options = {
      headless: options.headless,
      sessionStatePath: options.sessionStatePath,
      defaultTimeoutMs: options.defaultTimeoutMs,
      scrollPauseMs: options.scrollPauseMs ?? 1500,
      maxScrollIterations: options.maxScrollIterations ?? 50,
      settleDelayMs: options.settleDelayMs ?? 1000,
      screenshotDir: options.screenshotDir ?? './debug',
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      viewport: options.viewport ?? { width: 1920, height: 1080 },
      launchArgs: options.launchArgs ?? DEFAULT_CHROMIUM_ARGS,
    };
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Whether start() restored a persisted session artifact
   */
  wasRestored(): boolean {
    return this.restored;
  }

  /**
   * Launches the browser and opens a page, restoring the persisted session
   * artifact when one exists. A restore failure falls back to a clean session.
   * @throws SessionUnavailableError if the browser cannot be launched
   */
  async start(): Promise<void> {
    if (this.state !== SessionState.UNSTARTED) {
      throw new SessionUnavailableError(`Cannot start a session that is ${this.state}`);
    }

    this.logger.info('Starting browser session', {
      headless: this.options.headless,
      sessionStatePath: this.options.sessionStatePath,
    });

    let browser: DrivenBrowser;
    try {
      browser = await this.launcher({
        headless: this.options.headless,
        args: this.options.launchArgs,
      });
    } catch (error) {
      throw new SessionUnavailableError('Failed to launch browser', { cause: error });
    }
    this.browser = browser;

    const pageOptions: PageOptions = {
      userAgent: this.options.userAgent,
      viewport: this.options.viewport,
      defaultTimeoutMs: this.options.defaultTimeoutMs,
    };

    let page: PageDriver | undefined;
    if (fs.existsSync(this.options.sessionStatePath)) {
      try {
        page = await browser.newPage({
          ...pageOptions,
          storageStatePath: this.options.sessionStatePath,
        });
        this.restored = true;
        this.logger.info('Loaded existing session state', {
          sessionStatePath: this.options.sessionStatePath,
        });
      } catch (error) {
        this.logger.warn('Failed to load session state, starting a clean session', {
          sessionStatePath: this.options.sessionStatePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (!page) {
      try {
        page = await browser.newPage(pageOptions);
      } catch (error) {
        await this.shutdownBrowser();
        throw new SessionUnavailableError('Failed to open a browser page', { cause: error });
      }
    }

    this.page = page;
    this.state = SessionState.STARTED;
    this.logger.info('Browser session started', { restored: this.restored });
  }

  /**
   * Persists the session artifact, then tears the browser down. Safe to call
   * from any state and more than once.
   */
  async close(): Promise<void> {
    if (this.state === SessionState.CLOSED) {
      return;
    }
    if (this.state === SessionState.UNSTARTED) {
      this.state = SessionState.CLOSED;
      return;
    }

    try {
      await this.saveSession();
    } finally {
      await this.shutdownBrowser();
      this.page = undefined;
      this.browser = undefined;
      this.state = SessionState.CLOSED;
      this.logger.info('Browser session closed');
    }
  }

  /**
   * Writes the current session artifact to its fixed path
   * @returns false when the state could not be written
   */
  async saveSession(): Promise<boolean> {
    if (!this.page || !this.browser?.isConnected()) {
      this.logger.error('Cannot save session state, browser is not available', {
        state: this.state,
      });
      return false;
    }

    try {
      const dir = path.dirname(this.options.sessionStatePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      await this.page.saveStorageState(this.options.sessionStatePath);
      this.logger.info('Session state saved', { sessionStatePath: this.options.sessionStatePath });
      return true;
    } catch (error) {
      this.logger.error('Failed to save session state', {
        sessionStatePath: this.options.sessionStatePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Navigates through the shared request gate. A slow load is logged and the
   * run continues.
   * @returns false when the navigation timed out or failed
   */
  async navigate(url: string, waitUntil: WaitUntil = 'domcontentloaded'): Promise<boolean> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      this.logger.info('Navigating', { url });
      let loaded = true;
      try {
        await this.gate.run('navigate', () =>
          page.goto(url, waitUntil, this.options.defaultTimeoutMs)
        );
      } catch (error) {
        this.rethrowIfDisconnected('navigate', error);
        const timedOut = error instanceof Error && error.name === 'TimeoutError';
        this.logger.warn(timedOut ? 'Navigation timed out, continuing' : 'Navigation failed, continuing', {
          url,
          error: error instanceof Error ? error.message : String(error),
        });
        loaded = false;
      }
      if (this.options.settleDelayMs > 0) {
        await this.clock.sleep(this.options.settleDelayMs);
      }
      return loaded;
    });
  }

  async waitFor(selector: string, timeoutMs?: number): Promise<boolean> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        await page.waitForSelector(selector, timeoutMs ?? this.options.defaultTimeoutMs);
        return true;
      } catch (error) {
        this.rethrowIfDisconnected('waitFor', error);
        this.logger.debug('Selector not found', { selector });
        return false;
      }
    });
  }

  /**
   * Clicks through the shared request gate, since a click may trigger a load
   */
  async click(selector: string, timeoutMs?: number): Promise<boolean> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        await this.gate.run('click', () =>
          page.click(selector, timeoutMs ?? this.options.defaultTimeoutMs)
        );
        this.logger.debug('Clicked', { selector });
        return true;
      } catch (error) {
        this.rethrowIfDisconnected('click', error);
        this.logger.warn('Failed to click', {
          selector,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    });
  }

  async type(selector: string, text: string, timeoutMs?: number): Promise<boolean> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        await page.fill(selector, text, timeoutMs ?? this.options.defaultTimeoutMs);
        this.logger.debug('Typed text', { selector });
        return true;
      } catch (error) {
        this.rethrowIfDisconnected('type', error);
        this.logger.warn('Failed to type', {
          selector,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    });
  }

  /**
   * Presses a key through the shared request gate, since Enter may submit a form
   */
  async pressKey(key: string): Promise<boolean> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        await this.gate.run('pressKey', () => page.press(key));
        return true;
      } catch (error) {
        this.rethrowIfDisconnected('pressKey', error);
        this.logger.warn('Failed to press key', {
          key,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    });
  }

  async readText(selector: string): Promise<string | null> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        return await page.textContent(selector);
      } catch (error) {
        this.rethrowIfDisconnected('readText', error);
        this.logger.debug('Failed to read text', { selector });
        return null;
      }
    });
  }

  async readAttribute(selector: string, name: string): Promise<string | null> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        return await page.getAttribute(selector, name);
      } catch (error) {
        this.rethrowIfDisconnected('readAttribute', error);
        this.logger.debug('Failed to read attribute', { selector, attribute: name });
        return null;
      }
    });
  }

  /**
   * Scrolls until two consecutive page-height measurements are equal, or the
   * iteration bound is reached
   * @returns Number of scroll iterations performed
   */
  async scrollToEnd(pauseMs?: number): Promise<number> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      const pause = pauseMs ?? this.options.scrollPauseMs;
      let iterations = 0;
      try {
        let previousHeight = await page.scrollHeight();
        while (iterations < this.options.maxScrollIterations) {
          await page.scrollToBottom();
          iterations++;
          await this.clock.sleep(pause);
          const height = await page.scrollHeight();
          if (height === previousHeight) {
            break;
          }
          this.logger.debug('Scrolled to height', { height, iterations });
          previousHeight = height;
        }
      } catch (error) {
        this.rethrowIfDisconnected('scrollToEnd', error);
        this.logger.warn('Scrolling stopped early', {
          iterations,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return iterations;
    });
  }

  /**
   * Serialized HTML of the current page
   * @throws SessionUnavailableError if the page cannot be read at all
   */
  async pageContent(): Promise<string> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      try {
        return await page.content();
      } catch (error) {
        throw new SessionUnavailableError('Failed to read page content', { cause: error });
      }
    });
  }

  currentUrl(): string {
    return this.page ? this.page.url() : '';
  }

  /**
   * Saves a full-page screenshot for debugging
   * @returns File path, or null when the capture failed
   */
  async captureScreenshot(name: string): Promise<string | null> {
    return this.exclusive(async () => {
      const page = this.requirePage();
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      const filePath = path.join(this.options.screenshotDir, `debug-${name}-${timestamp}.png`);
      try {
        if (!fs.existsSync(this.options.screenshotDir)) {
          fs.mkdirSync(this.options.screenshotDir, { recursive: true });
        }
        await page.screenshot(filePath);
        this.logger.info('Screenshot saved', { filePath });
        return filePath;
      } catch (error) {
        this.rethrowIfDisconnected('captureScreenshot', error);
        this.logger.warn('Failed to capture screenshot', {
          name,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
    });
  }

  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    await this.opLock.acquire();
    try {
      return await operation();
    } finally {
      this.opLock.release();
    }
  }

  private requirePage(): PageDriver {
    if (this.state !== SessionState.STARTED || !this.page || !this.browser) {
      throw new SessionUnavailableError(`Browser session is ${this.state}`);
    }
    if (!this.browser.isConnected()) {
      throw new SessionUnavailableError('Browser process is no longer connected');
    }
    return this.page;
  }

  private rethrowIfDisconnected(action: string, error: unknown): void {
    if (error instanceof SessionUnavailableError) {
      throw error;
    }
    if (this.browser && !this.browser.isConnected()) {
      throw new SessionUnavailableError(`Browser disconnected during ${action}`, { cause: error });
    }
  }

  private async shutdownBrowser(): Promise<void> {
    if (!this.browser) {
      return;
    }
    try {
      await this.browser.close();
    } catch (error) {
      this.logger.warn('Failed to close browser cleanly', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Runs `work` inside a started session and always closes it afterwards,
 * persisting the session artifact even when `work` throws
 */
export async function runWithSession<T>(
  manager: BrowserSessionManager,
  work: (session: BrowserSessionManager) => Promise<T>
): Promise<T> {
  await manager.start();
  try {
    return await work(manager);
  } finally {
    await manager.close();
  }
}
