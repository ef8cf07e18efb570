/**
 * Headless Chromium session against the video system's web UI.
 *
 * The UI has no stable download link, so the clip is exported by clicking
 * the archive button of the camera's event page (position per device, see
 * DeviceRegistry) and then the download entry of the menu it opens.
 */

import puppeteer, { Browser, Page } from 'puppeteer-core';
import { Credentials, Trigger } from '../types/alarm';
import { DeviceRegistry, ScreenPoint } from '../services/device-registry';
import { AcquisitionAuthError, ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { BrowserSession, BrowserSessionFactory } from './video-acquirer';

export interface BrowserSessionOptions {
  executablePath?: string;
  navigationTimeoutMs: number;
  usernameSelector?: string;
  passwordSelector?: string;
  submitSelector?: string;
}

// The download entry opens this far from the archive button
const DOWNLOAD_MENU_OFFSET = { x: -179, y: 18 } as const;
const MENU_SETTLE_MS = 1000;

const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--ignore-certificate-errors',
  '--no-first-run',
  '--no-zygote',
  '--window-size=1920,1080',
];

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class PuppeteerBrowserSession implements BrowserSession {
  private browser?: Browser;
  private page?: Page;

  constructor(
    private readonly downloadDirectory: string,
    private readonly archiveButton: ScreenPoint,
    private readonly options: BrowserSessionOptions,
    private readonly logger: Logger
  ) {}

  async open(url: string, credentials: Credentials): Promise<void> {
    if (!this.options.executablePath) {
      throw new ConfigurationError('CHROMIUM_PATH environment variable is not configured');
    }

    this.browser = await puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: true,
      args: CHROMIUM_ARGS,
      defaultViewport: { width: 1920, height: 1080 },
    });

    const page = await this.browser.newPage();
    this.page = page;

    const cdp = await page.createCDPSession();
    await cdp.send('Browser.setDownloadBehavior', {
      behavior: 'allow',
      downloadPath: this.downloadDirectory,
    });

    await page.goto(url, { waitUntil: 'networkidle2', timeout: this.options.navigationTimeoutMs });
    await this.signInIfAsked(page, credentials);
  }

  private async signInIfAsked(page: Page, credentials: Credentials): Promise<void> {
    const usernameSelector = this.options.usernameSelector ?? 'input[name="username"]';
    const passwordSelector = this.options.passwordSelector ?? 'input[name="password"]';
    const submitSelector = this.options.submitSelector ?? 'button[type="submit"]';

    if (!(await page.$(usernameSelector))) {
      return;
    }

    this.logger.info('Login form detected, signing in');
    await page.type(usernameSelector, credentials.username);
    await page.type(passwordSelector, credentials.password);
    await Promise.all([
      page.waitForNavigation({ waitUntil: 'networkidle2', timeout: this.options.navigationTimeoutMs }),
      page.click(submitSelector),
    ]);

    if (await page.$(usernameSelector)) {
      throw new AcquisitionAuthError(`Sign-in to ${credentials.hostname} was rejected`);
    }
  }

  async requestDownload(): Promise<void> {
    if (!this.page) {
      throw new Error('Browser session is not open');
    }

    const { x, y } = this.archiveButton;
    await this.page.mouse.click(x, y);
    await delay(MENU_SETTLE_MS);
    await this.page.mouse.click(x + DOWNLOAD_MENU_OFFSET.x, y + DOWNLOAD_MENU_OFFSET.y);
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.page = undefined;
    this.browser = undefined;
    if (browser) {
      await browser.close();
    }
  }
}

export function puppeteerSessionFactory(
  devices: DeviceRegistry,
  options: BrowserSessionOptions,
  logger: Logger
): BrowserSessionFactory {
  return async (downloadDirectory: string, trigger: Trigger) =>
    new PuppeteerBrowserSession(
      downloadDirectory,
      devices.getArchiveButton(trigger.device),
      options,
      logger.child({ eventId: trigger.eventId })
    );
}
