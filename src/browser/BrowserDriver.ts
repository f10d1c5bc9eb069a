/**
 * Narrow view of the driven browser used by the session manager.
 * The Playwright adapter implements it for real runs; tests supply an
 * in-process implementation.
 */

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface Viewport {
  width: number;
  height: number;
}

export interface PageOptions {
  /** Session artifact to restore from; omitted for a clean session */
  storageStatePath?: string;
  userAgent: string;
  viewport: Viewport;
  defaultTimeoutMs: number;
}

export interface LaunchOptions {
  headless: boolean;
  args: string[];
}

/**
 * One page inside one browser context
 */
export interface PageDriver {
  goto(url: string, waitUntil: WaitUntil, timeoutMs: number): Promise<void>;
  url(): string;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  click(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, text: string, timeoutMs: number): Promise<void>;
  press(key: string): Promise<void>;
  textContent(selector: string): Promise<string | null>;
  getAttribute(selector: string, name: string): Promise<string | null>;
  content(): Promise<string>;
  scrollToBottom(): Promise<void>;
  scrollHeight(): Promise<number>;
  screenshot(path: string): Promise<void>;
  /** Writes the context's storage state (cookies + storage) to `path` */
  saveStorageState(path: string): Promise<void>;
}

export interface DrivenBrowser {
  newPage(options: PageOptions): Promise<PageDriver>;
  isConnected(): boolean;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<DrivenBrowser>;
