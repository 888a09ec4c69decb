import * as cheerio from "cheerio";
import { hasChildren, isTag, isText, type AnyNode, type Element } from "domhandler";
import { TableNotFoundError } from "../errors.js";
import { normalizeSpaces } from "../normalize/index.js";

/**
 * - textBeforeTable: the first table after a text node containing the anchor
 * - caption: the first table whose caption contains the anchor
 */
export type AnchorMode = "textBeforeTable" | "caption";

export type LocateOptions = {
  /** Number of matching tables to pass over before taking one */
  skip?: number;
};

export type HtmlDocument = string | cheerio.CheerioAPI;

export function loadDocument(document: HtmlDocument): cheerio.CheerioAPI {
  return typeof document === "string" ? cheerio.load(document) : document;
}

const OPAQUE_TAGS = new Set(["script", "style", "noscript", "template"]);

/**
 * Document-order walk over every node
 */
function* walk(nodes: AnyNode[]): Generator<AnyNode> {
  for (const node of nodes) {
    yield node;
    if (hasChildren(node) && !(isTag(node) && OPAQUE_TAGS.has(node.name))) {
      yield* walk(node.children);
    }
  }
}

function locateAfterText($: cheerio.CheerioAPI, anchor: string, skip: number): Element {
  let anchorFound = false;
  let passed = 0;

  for (const node of walk($.root().toArray())) {
    if (!anchorFound) {
      if (isText(node) && normalizeSpaces(node.data).includes(anchor)) {
        anchorFound = true;
      }
      continue;
    }
    if (isTag(node) && node.name === "table") {
      if (passed === skip) return node;
      passed++;
    }
  }

  throw new TableNotFoundError(
    anchorFound ? `no table after "${anchor}"` : `anchor text "${anchor}" not found`
  );
}

function locateByCaption($: cheerio.CheerioAPI, anchor: string, skip: number): Element {
  const matches = $("table")
    .toArray()
    .filter((table) => normalizeSpaces($(table).children("caption").text()).includes(anchor));

  const table = matches[skip];
  if (!table) {
    throw new TableNotFoundError(`no table with caption containing "${anchor}"`);
  }
  return table;
}

/**
 * Finds the table identified by an anchor phrase.
 *
 * Uses the first match in document order; there is no nearest-heading
 * heuristic. Throws TableNotFoundError when the anchor or the table is missing.
 */
export function locateTable(
  $: cheerio.CheerioAPI,
  anchorPhrase: string,
  mode: AnchorMode,
  options: LocateOptions = {}
): Element {
  const anchor = normalizeSpaces(anchorPhrase);
  const skip = options.skip ?? 0;

  return mode === "caption" ? locateByCaption($, anchor, skip) : locateAfterText($, anchor, skip);
}
