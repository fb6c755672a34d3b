/**
 * rubric.ts
 *
 * Brings a freshly created assignment's rubric (one default "Correct" item)
 * to the requested list of (description, points) items.
 *
 * - item 0 rewrites the default item
 * - every further item clicks "Add Rubric Item", waits for the new item to
 *   mount and fills it in
 * - the item list is re-read from the page before every decision; inserts can
 *   re-create existing item nodes, so nothing is cached between steps
 * - each item is guarded on its own: a failed item is recorded and the pass moves on
 */

import type { BrowserDriver, DriverElement } from './driver';
import type { CreatorConfig, ObservedRubricItem, RubricEntry, RubricFailure, RubricReport } from './types';
import type { Interactor } from './interaction';
import { ElementUnavailableError, errorMessage } from './errors';
import { RUBRIC_ITEM, RUBRIC_POINTS, RUBRIC_TEXT } from './locators';
import { log } from './log';

export const DEFAULT_ITEM_LABEL = 'Correct';
export const PLACEHOLDER_LABELS: readonly string[] = ['Correct', 'Incorrect'];

// New items sometimes render more than one text node. Anything this short is
// taken as the editable description rather than an already-filled sibling.
const SHORT_TEXT_LIMIT = 20;

// Picks the description node inside a newly added item.
// This is a heuristic: a page layout change can make it pick the wrong node.
export async function pickDescriptionNode(nodes: DriverElement[]): Promise<DriverElement | null> {
  for (const node of nodes) {
    const text = (await node.text()).trim();
    if (PLACEHOLDER_LABELS.includes(text) || text === '' || text.length < SHORT_TEXT_LIMIT) {
      return node;
    }
  }
  return nodes[0] ?? null;
}

function parsePoints(text: string): number | null {
  const n = Number.parseFloat(text.trim());
  return Number.isFinite(n) ? n : null;
}

export class RubricSynchronizer {
  constructor(
    private readonly driver: BrowserDriver,
    private readonly ui: Interactor,
    private readonly cfg: CreatorConfig,
  ) {}

  async readRubric(): Promise<ObservedRubricItem[]> {
    const items = await this.driver.findAll([RUBRIC_ITEM]);
    const observed: ObservedRubricItem[] = [];

    for (const [positionIndex, item] of items.entries()) {
      const [textNode] = await item.findAll(RUBRIC_TEXT);
      const [pointsNode] = await item.findAll(RUBRIC_POINTS);
      observed.push({
        description: textNode ? (await textNode.text()).trim() : '',
        points: pointsNode ? parsePoints(await pointsNode.text()) : null,
        positionIndex,
      });
    }
    return observed;
  }

  async apply(target: readonly RubricEntry[]): Promise<RubricReport> {
    const failures: RubricFailure[] = [];
    let added = 0;

    for (const [index, entry] of target.entries()) {
      try {
        if (index === 0) {
          await this.fillDefaultItem(entry);
        } else {
          await this.mountNewItem();
          added++;
          await this.fillNewItem(entry);
        }
      } catch (error) {
        const reason = errorMessage(error);
        log.warn(`Rubric item ${index + 1} ("${entry.description}") not applied: ${reason}`);
        failures.push({ index, description: entry.description, reason });
      }

      if (index < target.length - 1) await this.driver.pause(this.cfg.pageSettleMs);
    }

    const observed = target.length > 0 ? await this.readRubric() : [];
    return { requested: target.length, added, failures, observed };
  }

  private async fillDefaultItem(entry: RubricEntry): Promise<void> {
    const items = await this.driver.findAll([RUBRIC_ITEM]);
    if (items.length === 0) throw new ElementUnavailableError('rubric item');

    let item: DriverElement | undefined;
    let textNode: DriverElement | undefined;

    for (const candidate of items) {
      for (const node of await candidate.findAll(RUBRIC_TEXT)) {
        if ((await node.text()).trim() === DEFAULT_ITEM_LABEL) {
          item = candidate;
          textNode = node;
          break;
        }
      }
      if (textNode) break;
    }

    // no placeholder label: only safe when there is exactly one item to edit
    if (!item || !textNode) {
      if (items.length !== 1) throw new ElementUnavailableError(`default rubric item "${DEFAULT_ITEM_LABEL}"`);
      item = items[0];
      [textNode] = await item.findAll(RUBRIC_TEXT);
      if (!textNode) throw new ElementUnavailableError('rubric item description');
    }

    await this.ui.reveal(textNode);
    await this.ui.pasteInto(textNode, entry.description, { viaActiveElement: true });
    await this.fillPoints(item, entry.points);
  }

  private async mountNewItem(): Promise<void> {
    const before = (await this.driver.findAll([RUBRIC_ITEM])).length;

    await this.ui.click('addRubricItemButton');
    const mounted = await this.driver.waitFor([RUBRIC_ITEM], { timeoutMs: this.cfg.timeoutMs, nth: before });
    if (!mounted) throw new ElementUnavailableError('new rubric item', this.cfg.timeoutMs);
  }

  private async fillNewItem(entry: RubricEntry): Promise<void> {

    const newest = await this.newestItem();
    const textNode = await pickDescriptionNode(await newest.findAll(RUBRIC_TEXT));
    if (!textNode) throw new ElementUnavailableError('rubric item description');

    await this.ui.reveal(textNode);
    await this.ui.pasteInto(textNode, entry.description, { viaActiveElement: true });

    // committing the description can re-render the item
    await this.fillPoints(await this.newestItem(), entry.points);
  }

  private async newestItem(): Promise<DriverElement> {
    const items = await this.driver.findAll([RUBRIC_ITEM]);
    const last = items[items.length - 1];
    if (!last) throw new ElementUnavailableError('rubric item');
    return last;
  }

  private async fillPoints(item: DriverElement, points: number): Promise<void> {
    const [pointsNode] = await item.findAll(RUBRIC_POINTS);
    if (!pointsNode) throw new ElementUnavailableError('rubric item points');

    await this.ui.reveal(pointsNode);
    await this.ui.pasteInto(pointsNode, String(points), { viaActiveElement: true });
  }
}
