/**
 * interaction.ts
 *
 * One logical UI action at a time (set a field, toggle a checkbox, click),
 * each preceded by resolving the control and scrolling it to the viewport
 * centre so lazily mounted controls are interactable.
 *
 * Text goes in one of two ways:
 * - replace: click, select-all, insert the whole value at once
 * - paste: copy the value to the clipboard, click, select-all, paste, Tab out.
 *   Used for date and rubric fields whose input masks rewrite typed keystrokes.
 */

import type { BrowserDriver, DriverElement } from './driver';
import type { CreatorConfig, Role } from './types';
import { ElementUnavailableError, NotClickableError } from './errors';
import { resolveRole } from './locators';

export type EntryMode = 'replace' | 'paste';

export type PasteOptions = {
  // click-to-edit controls (rubric text) swap in an editor on click, type into whatever has focus
  viaActiveElement?: boolean;
};

export class Interactor {
  constructor(
    private readonly driver: BrowserDriver,
    private readonly cfg: CreatorConfig,
  ) {}

  async locate(role: Role, opts: { clickable?: boolean } = {}): Promise<DriverElement> {
    const resolved = await resolveRole(this.driver, role, {
      timeoutMs: this.cfg.timeoutMs,
      clickable: opts.clickable,
    });
    if (!resolved.ok) {
      throw opts.clickable
        ? new NotClickableError(role, this.cfg.timeoutMs)
        : new ElementUnavailableError(role, this.cfg.timeoutMs);
    }
    await this.reveal(resolved.element);
    return resolved.element;
  }

  async reveal(element: DriverElement): Promise<void> {
    await element.scrollIntoViewCenter();
    await this.driver.pause(this.cfg.settleMs);
  }

  async setField(role: Role, value: string, mode: EntryMode = 'replace'): Promise<void> {
    const element = await this.locate(role);
    if (mode === 'paste') {
      await this.pasteInto(element, value);
    } else {
      await this.replaceText(element, value);
    }
  }

  // Returns true when a click was needed; an already-correct box is never clicked.
  async toggle(role: Role, desired: boolean): Promise<boolean> {
    const element = await this.locate(role);
    if ((await element.isChecked()) === desired) return false;

    await element.click();
    await this.driver.pause(this.cfg.commitDelayMs);
    return true;
  }

  async click(role: Role): Promise<void> {
    const element = await this.locate(role, { clickable: true });
    await element.click();
  }

  async replaceText(element: DriverElement, value: string): Promise<void> {
    await element.click();
    await element.press('SelectAll');
    await element.insertText(value);
  }

  async pasteInto(element: DriverElement, value: string, opts: PasteOptions = {}): Promise<void> {
    await this.driver.writeClipboard(value);
    await element.click();
    await this.driver.pause(this.cfg.commitDelayMs);

    const target = opts.viaActiveElement ? ((await this.driver.activeElement()) ?? element) : element;
    await target.press('SelectAll');
    await target.press('Paste');
    await target.press('Tab');
    await this.driver.pause(this.cfg.commitDelayMs);
  }
}
