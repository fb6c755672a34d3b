/**
 * playwright-driver.ts
 *
 * BrowserDriver on top of a Playwright Page.
 * - selectors become locators; several selectors for one control are joined with `or`
 * - clickable waits use a trial click, which runs Playwright's actionability checks without clicking
 * - the clipboard is written from inside the page, so the context needs clipboard permissions
 */

import type { Locator, Page } from '@playwright/test';
import type { BrowserDriver, DriverElement, Key, Selector, WaitOptions } from './driver';

const KEYS: Record<Key, string> = {
  SelectAll: 'ControlOrMeta+a',
  Paste: 'ControlOrMeta+v',
  Tab: 'Tab',
};

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

function toLocator(root: Page | Locator, selector: Selector): Locator {
  switch (selector.by) {
    case 'name': {
      const type = selector.inputType ? `[type="${selector.inputType}"]` : '';
      return root.locator(`[name="${selector.name}"]${type}`);
    }
    case 'css':
      return root.locator(selector.css);
    case 'text': {
      const css = selector.enabledOnly ? `${selector.css}:not(.disabled):not([disabled])` : selector.css;
      return root.locator(css).filter({ hasText: selector.text });
    }
  }
}

function combine(page: Page, selectors: readonly Selector[]): Locator {
  const [first, ...rest] = selectors.map((s) => toLocator(page, s));
  if (!first) throw new Error('no selectors given');
  return rest.reduce((acc, loc) => acc.or(loc), first);
}

class PlaywrightElement implements DriverElement {
  constructor(
    private readonly page: Page,
    private readonly locator: Locator,
  ) {}

  async click(): Promise<void> {
    await this.locator.click();
  }

  async scrollIntoViewCenter(): Promise<void> {
    await this.locator.evaluate((el) => el.scrollIntoView({ block: 'center' }));
  }

  async press(key: Key): Promise<void> {
    await this.locator.press(KEYS[key]);
  }

  async insertText(text: string): Promise<void> {
    await this.locator.focus();
    await this.page.keyboard.insertText(text);
  }

  async text(): Promise<string> {
    return this.locator.innerText();
  }

  async isChecked(): Promise<boolean> {
    return this.locator.isChecked();
  }

  async findAll(selector: Selector): Promise<DriverElement[]> {
    const found = await toLocator(this.locator, selector).all();
    return found.map((loc) => new PlaywrightElement(this.page, loc));
  }
}

export class PlaywrightDriver implements BrowserDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url);
  }

  currentUrl(): string {
    return this.page.url();
  }

  async waitFor(selectors: readonly Selector[], options: WaitOptions): Promise<DriverElement | null> {
    const all = combine(this.page, selectors);
    const target = options.nth === undefined ? all.first() : all.nth(options.nth);

    try {
      await target.waitFor({ state: options.clickable ? 'visible' : 'attached', timeout: options.timeoutMs });
      if (options.clickable) await target.click({ trial: true, timeout: options.timeoutMs });
    } catch (error) {
      if (isTimeout(error)) return null;
      throw error;
    }
    return new PlaywrightElement(this.page, target);
  }

  async findAll(selectors: readonly Selector[]): Promise<DriverElement[]> {
    const found = await combine(this.page, selectors).all();
    return found.map((loc) => new PlaywrightElement(this.page, loc));
  }

  async activeElement(): Promise<DriverElement | null> {
    const focused = this.page.locator('*:focus');
    if ((await focused.count()) === 0) return null;
    return new PlaywrightElement(this.page, focused.first());
  }

  async writeClipboard(text: string): Promise<void> {
    await this.page.evaluate((value) => navigator.clipboard.writeText(value), text);
  }

  async pause(ms: number): Promise<void> {
    if (ms > 0) await this.page.waitForTimeout(ms);
  }
}
