import { chromium, Browser, Page } from 'playwright';
import { ViewportSize } from '../models/harvest';
import { BrowserDriver, BrowserLauncher, BrowserPage, NavigateOptions, PageElement } from './browserDriver';

class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page){}

  async setViewportSize(size: ViewportSize): Promise<void> {
    await this.page.setViewportSize(size);
  }

  async goto(url: string, options: NavigateOptions): Promise<void> {
    await this.page.goto(url, { waitUntil: 'networkidle', timeout: options.timeoutMs });
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map(h => ({
      innerText: () => h.innerText(),
      textContent: () => h.textContent(),
    }));
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PlaywrightDriver implements BrowserDriver {
  constructor(private readonly browser: Browser){}

  async newPage(): Promise<BrowserPage> {
    return new PlaywrightPage(await this.browser.newPage());
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/** Launch Chromium. Browsers must already be installed (npx playwright install chromium). */
export const launchPlaywright: BrowserLauncher = async ({ headless }) => {
  const browser = await chromium.launch({ headless });
  return new PlaywrightDriver(browser);
};
