import type { Logger } from '../utils/logger';
import type { BrowserSessionManager } from './SessionManager';
import { systemClock, type Clock } from '../limits/RateLimiter';
import { SessionUnavailableError } from '../types/errors';
import { siteSelectors, siteUrl, type AuthSelectors, type SitePaths } from '../config/selectors';

/**
 * Outcome of a login attempt. Authentication failures are reported here,
 * never thrown.
 */
export interface LoginResult {
  success: boolean;
  message: string;
}

export interface Credentials {
  email: string;
  password: string;
}

export type VerificationSignal = 'success-indicator' | 'login-url' | 'error-indicator' | 'no-signal';

export interface VerificationOutcome {
  verified: boolean;
  signal: VerificationSignal;
  detail?: string;
}

export interface AuthenticatorOptions {
  baseUrl: string;
  selectors?: AuthSelectors;
  paths?: SitePaths;
  fieldWaitMs?: number; // per-candidate wait for form fields (default: 3000)
  indicatorWaitMs?: number; // per-candidate wait for success indicators (default: 5000)
  settleMs?: number; // pause after submit before verifying (default: 2000)
}

/**
 * Drives the login form through a session manager and verifies the
 * authenticated state
 */
export class Authenticator {
  private readonly session: BrowserSessionManager;
  private readonly credentials?: Credentials;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly baseUrl: string;
  private readonly selectors: AuthSelectors;
  private readonly paths: SitePaths;
  private readonly fieldWaitMs: number;
  private readonly indicatorWaitMs: number;
  private readonly settleMs: number;

  constructor(
    session: BrowserSessionManager,
    credentials: Credentials | undefined,
    logger: Logger,
    options: AuthenticatorOptions,
    clock: Clock = systemClock
  ) {
    this.session = session;
    this.credentials = credentials;
    this.logger = logger;
    this.clock = clock;
    this.baseUrl = options.baseUrl;
    this.selectors = options.selectors ?? siteSelectors.auth;
    this.paths = options.paths ?? siteSelectors.paths;
    this.fieldWaitMs = options.fieldWaitMs ?? 3000;
    this.indicatorWaitMs = options.indicatorWaitMs ?? 5000;
    this.settleMs = options.settleMs ?? 2000;
  }

  /**
   * Navigate, fill both credentials, submit, wait, verify. The session
   * artifact is persisted as soon as the login verifies.
   * @throws SessionUnavailableError when the browser itself is unusable
   */
  async login(): Promise<LoginResult> {
    if (!this.credentials) {
      this.logger.error('Login skipped, credentials are not configured');
      return { success: false, message: 'Missing credentials' };
    }

    this.logger.info('Attempting login');

    try {
      const loginUrl = siteUrl(this.baseUrl, this.paths.login);
      await this.session.navigate(loginUrl);

      if (!(await this.fillFirst('email', this.selectors.emailInputs, this.credentials.email))) {
        return { success: false, message: 'Could not find email input field' };
      }
      if (!(await this.fillFirst('password', this.selectors.passwordInputs, this.credentials.password))) {
        return { success: false, message: 'Could not find password input field' };
      }
      if (!(await this.submit())) {
        return { success: false, message: 'Could not submit login form' };
      }

      await this.clock.sleep(this.settleMs);

      const outcome = await this.verify();
      if (outcome.verified) {
        await this.session.saveSession();
        this.logger.info('Login successful', { signal: outcome.signal });
        return { success: true, message: 'Login successful' };
      }

      this.logger.warn('Login verification failed', {
        signal: outcome.signal,
        detail: outcome.detail,
      });
      await this.session.captureScreenshot('login_failed');
      return {
        success: false,
        message: outcome.signal === 'error-indicator' && outcome.detail
          ? `Login failed: ${outcome.detail}`
          : 'Login verification failed',
      };
    } catch (error) {
      if (error instanceof SessionUnavailableError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Login error', { error: message });
      return { success: false, message: `Login error: ${message}` };
    }
  }

  /**
   * Checks the current page for an authenticated state. Signals are
   * evaluated in order and the first definitive one wins; without any signal
   * the outcome is "not verified".
   */
  async verify(): Promise<VerificationOutcome> {
    for (const indicator of this.selectors.successIndicators) {
      if (await this.session.waitFor(indicator, this.indicatorWaitMs)) {
        this.logger.debug('Authenticated state verified', { indicator });
        return { verified: true, signal: 'success-indicator', detail: indicator };
      }
    }

    const currentUrl = this.session.currentUrl();
    if (currentUrl.toLowerCase().includes('login')) {
      return { verified: false, signal: 'login-url', detail: currentUrl };
    }

    for (const selector of this.selectors.errorIndicators) {
      const errorText = await this.session.readText(selector);
      if (errorText) {
        return { verified: false, signal: 'error-indicator', detail: errorText };
      }
    }

    return { verified: false, signal: 'no-signal' };
  }

  /**
   * Verifies a restored session against the dashboard without logging in
   */
  async isLoggedIn(): Promise<boolean> {
    this.logger.info('Checking login status');
    await this.session.navigate(siteUrl(this.baseUrl, this.paths.dashboard));
    const outcome = await this.verify();
    this.logger.info(outcome.verified ? 'Already logged in' : 'Not logged in', {
      signal: outcome.signal,
    });
    return outcome.verified;
  }

  /**
   * Reuses a restored session when it still verifies, otherwise logs in
   */
  async ensureAuthenticated(): Promise<LoginResult> {
    if (await this.isLoggedIn()) {
      return { success: true, message: 'Existing session is valid' };
    }
    return this.login();
  }

  async logout(): Promise<boolean> {
    this.logger.info('Logging out');
    for (const selector of this.selectors.logoutButtons) {
      if ((await this.session.waitFor(selector, this.fieldWaitMs)) && (await this.session.click(selector))) {
        await this.clock.sleep(this.settleMs);
        this.logger.info('Logout successful', { selector });
        return true;
      }
    }
    this.logger.warn('Could not find a logout control');
    return false;
  }

  private async fillFirst(field: string, selectors: string[], value: string): Promise<boolean> {
    for (const selector of selectors) {
      if ((await this.session.waitFor(selector, this.fieldWaitMs)) && (await this.session.type(selector, value))) {
        this.logger.debug('Filled login field', { field, selector });
        return true;
      }
    }
    this.logger.error('Could not find login field', { field, tried: selectors.length });
    return false;
  }

  private async submit(): Promise<boolean> {
    for (const selector of this.selectors.submitButtons) {
      if ((await this.session.waitFor(selector, this.fieldWaitMs)) && (await this.session.click(selector))) {
        this.logger.debug('Submitted login form', { selector });
        return true;
      }
    }
    if (await this.session.pressKey('Enter')) {
      this.logger.debug('Submitted login form with Enter key');
      return true;
    }
    this.logger.error('Could not submit login form');
    return false;
  }
}
