/**
 * Session Navigator
 *
 * Handles page navigation on the e-invoice portal:
 * - login: business login form, audio CAPTCHA, dashboard verification,
 *   announcement popups
 * - openReportScreen: menu path to the B2B query/download screen
 *
 * A CAPTCHA that is never solved and a login that fails after the CAPTCHA
 * was accepted raise different errors; only the second one points at the
 * credentials.
 */
import config from "../../config";
import { PORTAL, RETRY_CONFIG } from "../../config/constants";
import { BrowserSession } from "../browser/browser-session";
import { RetryController } from "../captcha/retry-controller";
import { loginChallengeForm } from "../captcha/captcha-solver";
import { Credentials } from "../../shared/types/portal.types";
import {
  CaptchaExhaustedError,
  LoginError,
  NavigationError,
} from "../../shared/errors/portal.errors";
import { retryWithBackoff, sleep } from "../../shared/utils/retry";
import { logger, maskId } from "../../monitoring/logger";

export interface NavigatorOptions {
  baseUrl: string;
  loginPath: string;
  dashboardPath: string;
  maxCaptchaAttempts: number;
  /** How long to wait for the dashboard after the CAPTCHA is accepted */
  landingTimeoutMs: number;
  /** Delay before re-opening a login page that failed to load */
  navigationRetryDelayMs: number;
  /** Wait for optional elements such as popups */
  probeTimeoutMs: number;
  /** Pause after each menu click */
  settleMs: number;
}

export class SessionNavigator {
  private captcha: RetryController;
  private options: NavigatorOptions;

  constructor(captcha: RetryController, options: Partial<NavigatorOptions> = {}) {
    this.captcha = captcha;
    this.options = {
      baseUrl: options.baseUrl ?? config.portalBaseUrl,
      loginPath: options.loginPath ?? config.loginPath,
      dashboardPath: options.dashboardPath ?? config.dashboardPath,
      maxCaptchaAttempts: options.maxCaptchaAttempts ?? config.captchaMaxAttempts,
      landingTimeoutMs: options.landingTimeoutMs ?? config.navigationTimeoutMs,
      navigationRetryDelayMs:
        options.navigationRetryDelayMs ?? RETRY_CONFIG.NAVIGATION_DELAY_MS,
      probeTimeoutMs: options.probeTimeoutMs ?? PORTAL.PROBE_TIMEOUT_MS,
      settleMs: options.settleMs ?? PORTAL.UI_SETTLE_MS,
    };
  }

  get loginUrl(): string {
    return new URL(this.options.loginPath, this.options.baseUrl).toString();
  }

  get dashboardUrl(): string {
    return new URL(this.options.dashboardPath, this.options.baseUrl).toString();
  }

  /**
   * Log in with the business account.
   *
   * @throws NavigationError if the login form is missing
   * @throws CaptchaExhaustedError if the CAPTCHA bound is reached
   * @throws LoginError if the dashboard is not reached after the CAPTCHA
   */
  async login(session: BrowserSession, credentials: Credentials): Promise<void> {
    const { BUSINESS_LOGIN_LINK, BUSINESS_ID_INPUT, USER_ID_INPUT, PASSWORD_INPUT } =
      PORTAL.SELECTORS;

    logger.info(
      { businessId: maskId(credentials.businessId), url: this.loginUrl },
      "Starting portal login"
    );

    await this.openLoginPage(session);
    await session.click(BUSINESS_LOGIN_LINK);

    if (!(await session.waitFor(BUSINESS_ID_INPUT, PORTAL.WAIT_TIMEOUT_MS))) {
      throw new NavigationError("Business login form did not appear");
    }

    const form = loginChallengeForm(this.loginUrl, async (s) => {
      await s.type(BUSINESS_ID_INPUT, credentials.businessId);
      await s.type(USER_ID_INPUT, credentials.userId);
      await s.type(PASSWORD_INPUT, credentials.password);
    });

    const report = await this.captcha.run(session, this.options.maxCaptchaAttempts, form);
    if (!report.solved) {
      throw new CaptchaExhaustedError(report.attempts);
    }

    await this.verifyLanding(session, report.portalMessage);
    await this.dismissPopups(session);

    logger.info({ attempts: report.attempts }, "Login successful");
  }

  /**
   * Walk the menu to the B2B single query/download screen.
   * @throws NavigationError if a menu entry or the report form is missing
   */
  async openReportScreen(session: BrowserSession): Promise<void> {
    const steps = PORTAL.SELECTORS.MENU_PATH;

    for (let i = 0; i < steps.length; i++) {
      const selector = steps[i];
      if (!(await session.waitFor(selector, PORTAL.WAIT_TIMEOUT_MS))) {
        throw new NavigationError(
          `Menu entry ${selector} not found (step ${i + 1}/${steps.length}); portal layout may have changed`
        );
      }
      await session.click(selector);
      logger.info({ step: i + 1, selector }, "Menu entry clicked");
      await sleep(this.options.settleMs);
    }

    if (!(await session.waitFor(PORTAL.SELECTORS.MONTH_INPUT, PORTAL.WAIT_TIMEOUT_MS))) {
      throw new NavigationError("Report form did not appear after menu navigation");
    }

    logger.info("Report screen opened");
  }

  private async openLoginPage(session: BrowserSession): Promise<void> {
    await retryWithBackoff(
      async () => {
        await session.goto(this.loginUrl);
        const ready = await session.waitFor(
          PORTAL.SELECTORS.BUSINESS_LOGIN_LINK,
          PORTAL.WAIT_TIMEOUT_MS
        );
        if (!ready) {
          throw new NavigationError("Business login link not found on login page");
        }
      },
      {
        maxAttempts: RETRY_CONFIG.NAVIGATION_ATTEMPTS,
        initialDelayMs: this.options.navigationRetryDelayMs,
        label: "open login page",
      }
    );
  }

  /**
   * Wait for the dashboard URL.
   * @throws LoginError carrying whatever the portal said
   */
  private async verifyLanding(
    session: BrowserSession,
    portalMessage: string | undefined
  ): Promise<void> {
    if (portalMessage === undefined) {
      const deadline = Date.now() + this.options.landingTimeoutMs;
      for (;;) {
        if (session.currentUrl().startsWith(this.dashboardUrl)) return;
        if (Date.now() >= deadline) break;
        await sleep(250);
      }
    }

    const message =
      portalMessage ??
      (await session.textsOf(PORTAL.SELECTORS.FEEDBACK)).join(" / ");

    logger.error(
      { url: session.currentUrl(), portalMessage: message },
      "Login verification failed"
    );
    throw new LoginError(
      `Login did not reach the dashboard (at ${session.currentUrl()})`,
      message || undefined
    );
  }

  /**
   * Close announcement dialogs shown after login: close buttons first,
   * then buttons labelled 關閉/確定/OK/Close, then Escape.
   */
  private async dismissPopups(session: BrowserSession): Promise<void> {
    const closeSelectors = PORTAL.SELECTORS.POPUP_CLOSE;

    if (await session.waitFor(closeSelectors.join(", "), this.options.probeTimeoutMs)) {
      for (const selector of closeSelectors) {
        if (await session.exists(selector)) {
          await session.click(selector);
          logger.info({ selector }, "Closed popup");
          return;
        }
      }
    }

    for (const text of PORTAL.POPUP_TEXTS) {
      if (await session.clickByText(PORTAL.SELECTORS.POPUP_BUTTON, text)) {
        logger.info({ text }, "Closed popup by button text");
        return;
      }
    }

    await session.pressKey("Escape");
    logger.debug("No popup found, sent Escape");
  }
}
