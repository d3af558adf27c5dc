import type { LineItem } from "../types";
import { LINE_ITEM_PATTERN } from "./patterns";

// `<description> <integer quantity> <price>`, one candidate row per line.
export function detectLineItems(text: string): LineItem[] {
  const items: LineItem[] = [];
  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const m = LINE_ITEM_PATTERN.exec(line);
    if (!m?.groups) continue;
    items.push({ description: m.groups.desc, quantity: m.groups.qty, price: m.groups.price });
  }
  return items;
}
