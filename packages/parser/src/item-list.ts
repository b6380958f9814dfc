import { Item, ItemType } from './types.js';

/**
 * Anchor a type filter so that it has to match the whole type tag.
 */
function fullMatch(filter: string | RegExp): RegExp {
  const source = typeof filter === 'string' ? filter : filter.source;
  const flags = typeof filter === 'string' ? '' : filter.flags.replace(/[gy]/g, '');
  return new RegExp(`^(?:${source})$`, flags);
}

/**
 * An ordered, append-only collection of parsed items.
 */
export class ItemList {
  private readonly items: Item[] = [];

  addItem(item: Item | null | undefined): void {
    if (item === null || item === undefined) {
      throw new TypeError('Cannot add a null or undefined item');
    }
    this.items.push(item);
  }

  getItems(): readonly Item[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * All items whose type tag fully matches the filter, in insertion order.
   */
  getItemsByType(filter: string | RegExp): Item[] {
    const re = fullMatch(filter);
    return this.items.filter((item) => re.test(item.type));
  }

  getFirstItemByType(filter: string | RegExp): Item | undefined {
    const re = fullMatch(filter);
    return this.items.find((item) => re.test(item.type));
  }

  /**
   * Typed lookup of the first item carrying exactly the given tag.
   */
  getFirstItemOfType<K extends ItemType>(type: K): Extract<Item, { type: K }> | undefined {
    return this.items.find((item): item is Extract<Item, { type: K }> => item.type === type);
  }

  toString(): string {
    return `[${this.items.map((item) => item.type).join(', ')}]`;
  }
}
