/**
 * driver.ts
 *
 * The browser boundary the creator consumes. Everything that touches a live
 * page goes through these two interfaces, so the wizard and rubric logic can
 * run against Playwright in production and an in-memory page in tests.
 */

// How to find an element.
// - name: form field by its `name` attribute (optionally only a given input type)
// - css: plain structural selector
// - text: elements matching `css` whose visible text contains `text`
export type Selector =
  | { by: 'name'; name: string; inputType?: string }
  | { by: 'css'; css: string }
  | { by: 'text'; css: string; text: string; enabledOnly?: boolean };

export type Key = 'SelectAll' | 'Paste' | 'Tab';

export type WaitOptions = {
  timeoutMs: number;
  // also require visible + enabled
  clickable?: boolean;
  // wait for the nth match (0-based) instead of the first
  nth?: number;
};

export interface DriverElement {
  click(): Promise<void>;
  scrollIntoViewCenter(): Promise<void>;
  press(key: Key): Promise<void>;
  insertText(text: string): Promise<void>;
  text(): Promise<string>;
  isChecked(): Promise<boolean>;
  findAll(selector: Selector): Promise<DriverElement[]>;
}

export interface BrowserDriver {
  goto(url: string): Promise<void>;
  currentUrl(): string;
  // resolves null when nothing matching any of the selectors shows up in time
  waitFor(selectors: readonly Selector[], options: WaitOptions): Promise<DriverElement | null>;
  findAll(selectors: readonly Selector[]): Promise<DriverElement[]>;
  activeElement(): Promise<DriverElement | null>;
  writeClipboard(text: string): Promise<void>;
  pause(ms: number): Promise<void>;
}
