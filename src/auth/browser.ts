import { mkdirSync } from 'node:fs';
import { Builder, By, until, type WebDriver } from 'selenium-webdriver';
import { Options, ServiceBuilder } from 'selenium-webdriver/chrome.js';
import { createLogger } from '../utils/logger.js';
import type { DriverHandle } from './types.js';

const log = createLogger('browser');

/** The slice of browser automation the login flow needs. Selectors are CSS. */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  waitForElement(selector: string, timeoutMs: number): Promise<void>;
  exists(selector: string): Promise<boolean>;
  type(selector: string, text: string): Promise<void>;
  click(selector: string): Promise<void>;
  currentUrl(): Promise<string>;
  pageText(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(driver: DriverHandle): Promise<BrowserSession>;
}

export class SeleniumBrowserSession implements BrowserSession {
  private closed = false;

  constructor(private driver: WebDriver) {}

  async navigate(url: string): Promise<void> {
    await this.driver.get(url);
  }

  async waitForElement(selector: string, timeoutMs: number): Promise<void> {
    const el = await this.driver.wait(until.elementLocated(By.css(selector)), timeoutMs);
    await this.driver.wait(until.elementIsVisible(el), timeoutMs);
  }

  async exists(selector: string): Promise<boolean> {
    const found = await this.driver.findElements(By.css(selector));
    return found.length > 0;
  }

  async type(selector: string, text: string): Promise<void> {
    const el = await this.driver.findElement(By.css(selector));
    await el.clear();
    await el.sendKeys(text);
  }

  async click(selector: string): Promise<void> {
    await this.driver.findElement(By.css(selector)).click();
  }

  async currentUrl(): Promise<string> {
    return this.driver.getCurrentUrl();
  }

  async pageText(): Promise<string> {
    return this.driver.findElement(By.css('body')).getText();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.driver.quit();
      log.debug('Browser closed');
    } catch (err) {
      log.warn({ err }, 'Browser did not quit cleanly');
    }
  }
}

export interface SeleniumLauncherOptions {
  headless: boolean;
}

export class SeleniumBrowserLauncher implements BrowserLauncher {
  constructor(private opts: SeleniumLauncherOptions) {}

  async launch(driver: DriverHandle): Promise<BrowserSession> {
    mkdirSync(driver.browserProfileDir, { recursive: true });

    const options = new Options();
    if (this.opts.headless) {
      options.addArguments('--headless=new', '--disable-gpu', '--window-size=1920,1080');
    }
    options.addArguments(
      `--user-data-dir=${driver.browserProfileDir}`,
      '--no-first-run',
      '--no-default-browser-check',
      '--disable-dev-shm-usage',
    );

    const service = new ServiceBuilder(driver.binaryPath);
    const webDriver = await new Builder()
      .forBrowser('chrome')
      .setChromeOptions(options)
      .setChromeService(service)
      .build();

    log.info({ driverVersion: driver.version, headless: this.opts.headless }, 'Browser launched');
    return new SeleniumBrowserSession(webDriver);
  }
}
