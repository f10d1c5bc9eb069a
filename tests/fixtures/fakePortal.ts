import * as fs from 'fs';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type {
  BrowserLauncher,
  DrivenBrowser,
  LaunchOptions,
  PageDriver,
  PageOptions,
} from '../../src/browser/BrowserDriver';

export interface FakeRequest {
  url: URL;
  loggedIn: boolean;
}

export type FakeResponse = string | { redirect: string };
export type FakeRoute = (request: FakeRequest) => FakeResponse;

export interface FakePortalOptions {
  baseUrl?: string;
  routes: Record<string, FakeRoute>;
  credentials?: { email: string; password: string };
  /** Where a successful login form submission lands */
  afterLoginPath?: string;
  loginPath?: string;
  /** Paths whose navigation fails with a TimeoutError */
  slowPaths?: string[];
  /** Page height after `scrolls` scrolls to the bottom */
  scrollHeight?: (scrolls: number) => number;
  failLaunch?: boolean;
}

interface StoredState {
  cookies: Array<{ name: string; value: string }>;
}

const SESSION_COOKIE = 'portal_session';
const SESSION_VALUE = 'test-session';

function timeoutError(message: string): Error {
  const error = new Error(message);
  error.name = 'TimeoutError';
  return error;
}

function isStoredState(value: unknown): value is StoredState {
  return (
    typeof value === 'object' &&
    value !== null &&
    'cookies' in value &&
    Array.isArray(value.cookies)
  );
}

/**
 * In-process portal: serves HTML from a route table and emulates just enough
 * of a browser (cookies, forms, links, scrolling) to drive the automation.
 */
export class FakePortal {
  readonly baseUrl: string;
  readonly visits: string[] = [];
  readonly screenshots: string[] = [];
  launches = 0;
  loginSubmissions = 0;
  connected = true;

  private readonly options: FakePortalOptions;

  constructor(options: FakePortalOptions) {
    this.options = options;
    this.baseUrl = options.baseUrl ?? 'https://portal.example.test';
  }

  readonly launcher: BrowserLauncher = async (_options: LaunchOptions): Promise<DrivenBrowser> => {
    this.launches++;
    if (this.options.failLaunch) {
      throw new Error('Executable not found');
    }
    this.connected = true;
    return new FakeBrowser(this);
  };

  /** Simulates the browser process going away */
  crash(): void {
    this.connected = false;
  }

  resolve(target: string, from?: string): URL {
    return new URL(target, from ?? this.baseUrl);
  }

  isSlow(url: URL): boolean {
    return (this.options.slowPaths ?? []).includes(url.pathname);
  }

  heightAfter(scrolls: number): number {
    return this.options.scrollHeight ? this.options.scrollHeight(scrolls) : 1000;
  }

  /**
   * Renders `url`, following redirects
   */
  render(url: URL, loggedIn: boolean): { url: URL; html: string } {
    let current = url;
    for (let hop = 0; hop < 5; hop++) {
      const route = this.options.routes[current.pathname];
      if (!route) {
        return { url: current, html: '<html><body><h1>Not found</h1></body></html>' };
      }
      const response = route({ url: current, loggedIn });
      if (typeof response === 'string') {
        return { url: current, html: response };
      }
      current = this.resolve(response.redirect, current.toString());
    }
    throw new Error(`Too many redirects for ${url.toString()}`);
  }

  /**
   * @returns Path to land on after a form submission
   */
  submitLogin(fields: ReadonlyMap<string, string>): { path: string; loggedIn: boolean } {
    this.loginSubmissions++;
    const credentials = this.options.credentials;
    const loginPath = this.options.loginPath ?? '/login/student';
    if (
      credentials &&
      fields.get('email') === credentials.email &&
      fields.get('password') === credentials.password
    ) {
      return { path: this.options.afterLoginPath ?? '/student/dashboard', loggedIn: true };
    }
    return { path: `${loginPath}?error=1`, loggedIn: false };
  }
}

class FakeBrowser implements DrivenBrowser {
  private readonly portal: FakePortal;
  private closed = false;

  constructor(portal: FakePortal) {
    this.portal = portal;
  }

  async newPage(options: PageOptions): Promise<PageDriver> {
    const cookies = new Map<string, string>();
    if (options.storageStatePath) {
      const parsed: unknown = JSON.parse(fs.readFileSync(options.storageStatePath, 'utf-8'));
      if (!isStoredState(parsed)) {
        throw new Error('Malformed storage state');
      }
      for (const cookie of parsed.cookies) {
        cookies.set(cookie.name, cookie.value);
      }
    }
    return new FakePage(this.portal, cookies);
  }

  isConnected(): boolean {
    return !this.closed && this.portal.connected;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakePage implements PageDriver {
  private readonly portal: FakePortal;
  private readonly cookies: Map<string, string>;
  private readonly fields = new Map<string, string>();
  private currentUrl = 'about:blank';
  private $: CheerioAPI = cheerio.load('<html><body></body></html>');
  private scrolls = 0;

  constructor(portal: FakePortal, cookies: Map<string, string>) {
    this.portal = portal;
    this.cookies = cookies;
  }

  async goto(url: string): Promise<void> {
    this.ensureConnected();
    const target = this.portal.resolve(url, this.currentUrl === 'about:blank' ? undefined : this.currentUrl);
    this.portal.visits.push(target.toString());
    if (this.portal.isSlow(target)) {
      throw timeoutError(`Timeout exceeded navigating to ${target.toString()}`);
    }
    this.load(target);
  }

  url(): string {
    return this.currentUrl;
  }

  async waitForSelector(selector: string): Promise<void> {
    this.ensureConnected();
    if (this.select(selector).length === 0) {
      throw timeoutError(`Timeout waiting for ${selector}`);
    }
  }

  async click(selector: string): Promise<void> {
    this.ensureConnected();
    const target = this.select(selector).first();
    if (target.length === 0) {
      throw timeoutError(`Timeout waiting for ${selector}`);
    }
    // Script-driven entries carry their destination in data-target
    const href = target.attr('href') ?? target.attr('data-target');
    if (href) {
      await this.goto(href);
      return;
    }
    if (target.closest('form').length > 0) {
      this.submit();
    }
  }

  async fill(selector: string, text: string): Promise<void> {
    this.ensureConnected();
    const target = this.select(selector).first();
    if (target.length === 0) {
      throw timeoutError(`Timeout waiting for ${selector}`);
    }
    this.fields.set(target.attr('name') ?? target.attr('id') ?? selector, text);
  }

  async press(key: string): Promise<void> {
    this.ensureConnected();
    if (key === 'Enter' && this.$('form').length > 0) {
      this.submit();
    }
  }

  async textContent(selector: string): Promise<string | null> {
    this.ensureConnected();
    const target = this.select(selector).first();
    return target.length > 0 ? target.text() : null;
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    this.ensureConnected();
    const target = this.select(selector).first();
    return target.length > 0 ? target.attr(name) ?? null : null;
  }

  async content(): Promise<string> {
    this.ensureConnected();
    return this.$.html();
  }

  async scrollToBottom(): Promise<void> {
    this.ensureConnected();
    this.scrolls++;
  }

  async scrollHeight(): Promise<number> {
    this.ensureConnected();
    return this.portal.heightAfter(this.scrolls);
  }

  async screenshot(path: string): Promise<void> {
    this.ensureConnected();
    this.portal.screenshots.push(path);
  }

  async saveStorageState(path: string): Promise<void> {
    this.ensureConnected();
    const state: StoredState = {
      cookies: [...this.cookies.entries()].map(([name, value]) => ({ name, value })),
    };
    fs.writeFileSync(path, JSON.stringify(state));
  }

  private load(target: URL): void {
    const loggedIn = this.cookies.get(SESSION_COOKIE) === SESSION_VALUE;
    const page = this.portal.render(target, loggedIn);
    this.currentUrl = page.url.toString();
    this.$ = cheerio.load(page.html);
    this.fields.clear();
    this.scrolls = 0;
  }

  private submit(): void {
    const outcome = this.portal.submitLogin(this.fields);
    if (outcome.loggedIn) {
      this.cookies.set(SESSION_COOKIE, SESSION_VALUE);
    }
    const target = this.portal.resolve(outcome.path);
    this.portal.visits.push(target.toString());
    this.load(target);
  }

  /**
   * Cheerio selection with support for `:nth-match(selector, n)`
   */
  private select(selector: string) {
    const nth = /^:nth-match\((.+),\s*(\d+)\)$/.exec(selector);
    if (nth) {
      return this.$(nth[1]).eq(Number(nth[2]) - 1);
    }
    return this.$(selector);
  }

  private ensureConnected(): void {
    if (!this.portal.connected) {
      throw new Error('Target page, context or browser has been closed');
    }
  }
}
