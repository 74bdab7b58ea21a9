import { chromium, Browser, BrowserContext, Page } from 'playwright';
import * as log from '../utils/logger';
import {
  AuthenticationTimeoutError,
  BrowserLaunchError,
  errorMessage,
  isSessionLostError,
} from '../common/errors';
import { PINTEREST_SELECTORS, selectorListToQuery } from './selectors';
import { waitUntil, type WaitClock } from './wait_strategy';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

export type LoginState = 'logged_in' | 'logged_out' | 'unknown';

export interface LoginStateResult {
  state: LoginState;
  url: string;
  signal: string;
}

export type AuthResult = 'authenticated' | 'timed_out';

export function isLoginRedirectUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return /\/login\/?$/i.test(parsed.pathname) || parsed.pathname.startsWith('/login/');
  } catch {
    return url.includes('/login');
  }
}

/**
 * 로그인 상태 판정. 로그인 후 노출되는 요소가 가장 강한 신호이고,
 * 로그인 URL을 벗어났고 로그인 폼도 없으면 로그인된 것으로 본다.
 */
export function classifyLoginState(
  url: string,
  matchedLoggedInIndicator: string | null,
  loginFormVisible: boolean,
): LoginStateResult {
  if (matchedLoggedInIndicator) {
    return { state: 'logged_in', url, signal: `login_indicator:${matchedLoggedInIndicator}` };
  }
  if (isLoginRedirectUrl(url)) {
    return { state: 'logged_out', url, signal: 'login_url' };
  }
  if (loginFormVisible) {
    return { state: 'logged_out', url, signal: 'login_form_visible' };
  }
  if (!url || url === 'about:blank') {
    return { state: 'unknown', url, signal: 'blank_page' };
  }
  return { state: 'logged_in', url, signal: 'left_login_url' };
}

async function detectAnyVisible(page: Page, selectors: readonly string[]): Promise<string | null> {
  for (const sel of selectors) {
    const loc = page.locator(sel).first();
    if ((await loc.count()) > 0 && await loc.isVisible()) return sel;
  }
  return null;
}

export async function detectLoginState(page: Page): Promise<LoginStateResult> {
  const url = page.url();
  const indicator = await detectAnyVisible(page, PINTEREST_SELECTORS.loggedIn);
  const loginForm = (await page.locator(selectorListToQuery(PINTEREST_SELECTORS.loginForm)).count()) > 0;
  return classifyLoginState(url, indicator, loginForm);
}

export async function launchWithRetry<T>(
  launchFn: () => Promise<T>,
  opts: {
    maxRetries: number;
    retryDelayMs: number;
    stageName: string;
  },
): Promise<T> {
  let lastError: unknown = null;
  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await launchFn();
    } catch (error) {
      lastError = error;
      const retryable = attempt < opts.maxRetries;
      log.warn(
        `[${opts.stageName}] attempt=${attempt + 1}/${opts.maxRetries + 1} failed: ${String(error)}`,
      );
      if (!retryable) break;
      await new Promise((resolve) => setTimeout(resolve, opts.retryDelayMs));
    }
  }
  throw new BrowserLaunchError(opts.maxRetries + 1, lastError);
}

export type SessionDriver<S> = {
  launch: (headless: boolean) => Promise<S>;
  navigate: (session: S, url: string) => Promise<void>;
  detectLogin: (session: S) => Promise<LoginStateResult>;
  close: (session: S) => Promise<void>;
};

export type PlaywrightSessionSettings = {
  launchTimeoutMs: number;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
};

export function createPlaywrightSessionDriver(settings: PlaywrightSessionSettings): SessionDriver<BrowserSession> {
  return {
    launch: async (headless: boolean) => {
      const browser = await chromium.launch({
        headless,
        timeout: settings.launchTimeoutMs,
        args: [
          '--disable-notifications',
          headless ? '--window-size=1920,1080' : '--start-maximized',
        ],
      });
      browser.on('disconnected', () => log.warn('[session] browser disconnected'));
      try {
        const context = await browser.newContext({
          viewport: headless ? { width: 1920, height: 1080 } : null,
        });
        const page = context.pages()[0] ?? (await context.newPage());
        page.setDefaultTimeout(settings.actionTimeoutMs);
        page.setDefaultNavigationTimeout(settings.navigationTimeoutMs);
        return { browser, context, page };
      } catch (error) {
        await browser.close().catch(() => undefined);
        throw error;
      }
    },
    navigate: async (session, url) => {
      await session.page.goto(url, { waitUntil: 'domcontentloaded' });
    },
    detectLogin: async (session) => detectLoginState(session.page),
    close: async (session) => {
      await session.context.close().catch(() => undefined);
      await session.browser.close();
    },
  };
}

export type SessionControllerOptions<S> = {
  loginUrl: string;
  driver: SessionDriver<S>;
  pollIntervalMs: number;
  launchRetries: number;
  launchRetryDelayMs: number;
  clock?: WaitClock;
};

/**
 * 브라우저 세션 수명 관리. 실행당 하나, release는 어떤 종료 경로에서도 호출된다.
 */
export class SessionController<S = BrowserSession> {
  private readonly options: SessionControllerOptions<S>;
  private current: S | null = null;
  private lastLoginSignal = 'not_checked';

  constructor(options: SessionControllerOptions<S>) {
    this.options = options;
  }

  get session(): S {
    if (!this.current) {
      throw new Error('session is not acquired');
    }
    return this.current;
  }

  get isAcquired(): boolean {
    return this.current !== null;
  }

  get lastSignal(): string {
    return this.lastLoginSignal;
  }

  async acquire(headless: boolean): Promise<S> {
    if (this.current) return this.current;
    const started = Date.now();
    log.info(`[session] launching browser mode=${headless ? 'headless' : 'headed'}`);
    const session = await launchWithRetry(
      () => this.options.driver.launch(headless),
      {
        maxRetries: this.options.launchRetries,
        retryDelayMs: this.options.launchRetryDelayMs,
        stageName: 'browser_launch',
      },
    );
    this.current = session;
    log.logTiming('browser_launch_complete', started);

    await this.options.driver.navigate(session, this.options.loginUrl);
    log.info(`[session] login page opened: ${this.options.loginUrl}`);
    return session;
  }

  /** 로그인 신호가 보일 때까지 폴링한다. 시간 초과는 호출 측이 치명 오류로 처리 */
  async waitForManualAuthentication(timeoutSeconds: number): Promise<AuthResult> {
    const session = this.session;
    log.info(`[session] waiting up to ${timeoutSeconds}s for manual login`);
    const result = await waitUntil(
      async () => {
        const state = await this.options.driver.detectLogin(session);
        this.lastLoginSignal = state.signal;
        return state.state === 'logged_in';
      },
      {
        timeoutMs: Math.max(0, timeoutSeconds) * 1000,
        pollIntervalMs: this.options.pollIntervalMs,
        clock: this.options.clock,
        isFatal: isSessionLostError,
      },
    );
    log.info(`[session] login_state=${result.status} signal=${this.lastLoginSignal} attempts=${result.attempts}`);
    return result.status === 'satisfied' ? 'authenticated' : 'timed_out';
  }

  /** waitForManualAuthentication + 시간 초과 시 AuthenticationTimeoutError */
  async requireAuthentication(timeoutSeconds: number): Promise<void> {
    const result = await this.waitForManualAuthentication(timeoutSeconds);
    if (result === 'timed_out') {
      throw new AuthenticationTimeoutError(timeoutSeconds, this.lastLoginSignal);
    }
  }

  /** 여러 번 호출해도 안전하다. 정리 실패는 경고만 남긴다 */
  async release(): Promise<void> {
    const session = this.current;
    if (!session) return;
    this.current = null;
    try {
      await this.options.driver.close(session);
      log.info('[session] browser closed');
    } catch (error) {
      log.warn(`[session] browser close failed: ${errorMessage(error)}`);
    }
  }
}
