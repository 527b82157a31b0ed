import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export interface ContainerStrategy {
  name: string;
  locate($: CheerioAPI): Element[];
}

export interface LocatedContainers {
  strategy: string;
  containers: Element[];
}

// Most specific markup first. The listing has used each of these layouts.
export const CONTAINER_STRATEGIES: readonly ContainerStrategy[] = [
  {
    name: "spost_entries",
    locate: ($) => $("div.spost").toArray(),
  },
  {
    name: "entry_blocks",
    locate: ($) => $("div.entry-c").toArray(),
  },
  {
    name: "putusan_items",
    locate: ($) => $(".putusan-item").toArray(),
  },
  {
    name: "list_items",
    locate: ($) => $(".list-group-item, article").toArray(),
  },
  {
    name: "table_rows",
    locate: ($) =>
      $("table tr")
        .filter((_, row) => $(row).children("td").length > 0)
        .toArray(),
  },
];

export function locateContainers(
  $: CheerioAPI,
  strategies: readonly ContainerStrategy[] = CONTAINER_STRATEGIES,
): LocatedContainers | undefined {
  for (const strategy of strategies) {
    const containers = strategy.locate($);
    if (containers.length > 0) {
      return { strategy: strategy.name, containers };
    }
  }
  return undefined;
}
